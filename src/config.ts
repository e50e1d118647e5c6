import { z } from 'zod';
import { ConfigError } from './errors.js';
import { normalizeExtension } from './utils.js';
import type { TransformConfig } from './types.js';

export const DEFAULT_BASE_URL = 'https://portal.diakrit.com';
export const DEFAULT_OUTPUT_DIR = 'downloaded_images';
export const DEFAULT_LOG_FILE = 'image_downloader.log';
export const DEFAULT_PATH_FILTER = '/orderfiles/';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; order-images/0.1)';

export const RunConfigSchema = z.object({
  orderId: z.string().trim().min(1, 'order id is required'),
  extensions: z
    .array(z.string())
    .min(1)
    .transform((exts) => Array.from(new Set(exts.map(normalizeExtension).filter(Boolean))))
    .refine((exts) => exts.length > 0, 'at least one extension is required'),
  outputDir: z.string().min(1),
  baseUrl: z.string().url(),
  removeWidthHeight: z.boolean(),
  removeWatermark: z.boolean(),
  extraParamsToRemove: z.array(z.string().min(1)),
  parallel: z.boolean(),
  concurrency: z.number().int().min(1).max(64),
  logEnabled: z.boolean(),
  logFile: z.string().min(1),
  maxAttempts: z.number().int().min(1).max(10),
  timeoutMs: z.number().int().positive(),
  pathFilter: z.string(), // '' disables the filter
  skipExisting: z.boolean(),
  userAgent: z.string().min(1),
  summaryFile: z.string().min(1).optional()
});

export type RunConfig = Readonly<z.infer<typeof RunConfigSchema>>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

type Env = Record<string, string | undefined>;

export function configDefaults(env: Env = process.env): Omit<RunConfigInput, 'orderId'> {
  return {
    extensions: ['.jpg'],
    outputDir: DEFAULT_OUTPUT_DIR,
    baseUrl: env.BASE_URL || DEFAULT_BASE_URL,
    removeWidthHeight: false,
    removeWatermark: false,
    extraParamsToRemove: [],
    parallel: false,
    concurrency: parseInt(env.CONCURRENCY || '5', 10),
    logEnabled: false,
    logFile: env.LOG_FILE || DEFAULT_LOG_FILE,
    maxAttempts: parseInt(env.MAX_ATTEMPTS || '3', 10),
    timeoutMs: parseInt(env.TIMEOUT_MS || '10000', 10),
    pathFilter: DEFAULT_PATH_FILTER,
    skipExisting: true,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT
  };
}

export function parseRunConfig(input: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`));
  }
  return Object.freeze(parsed.data);
}

export function workerCount(config: RunConfig): number {
  return config.parallel ? config.concurrency : 1;
}

export function transformConfig(config: RunConfig): TransformConfig {
  return {
    removeWidthHeight: config.removeWidthHeight,
    removeWatermark: config.removeWatermark,
    extraParamsToRemove: config.extraParamsToRemove
  };
}
