import { Command } from 'commander';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { configDefaults, parseRunConfig, type RunConfig, type RunConfigInput } from './config.js';

const CliOptionsSchema = z.object({
  extensions: z.array(z.string()).optional(),
  output: z.string().optional(),
  baseUrl: z.string().optional(),
  removeParams: z.array(z.string()).optional(),
  rawImage: z.boolean().optional(),
  watermark: z.boolean().optional(), // false when --no-watermark is given
  parallel: z.boolean().optional(),
  concurrency: z.number().optional(),
  log: z.boolean().optional(),
  logFile: z.string().optional(),
  pathFilter: z.string().optional(),
  maxAttempts: z.number().optional(),
  timeout: z.number().optional(),
  skipExisting: z.boolean().optional(),
  summary: z.string().optional(),
  userAgent: z.string().optional()
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

const toInt = (value: string) => parseInt(value, 10);

export function createProgram(): Command {
  return new Command()
    .name('order-images')
    .description('Download the images listed on a portal order page')
    .version('0.1.0')
    .argument('<orderId>', 'order id whose images should be downloaded')
    .option('-e, --extensions <ext...>', 'file extensions to download (default: .jpg)')
    .option('-o, --output <dir>', 'directory to save images in (default: downloaded_images)')
    .option('-b, --base-url <url>', 'portal base URL (default: $BASE_URL or https://portal.diakrit.com)')
    .option('-r, --remove-params <name...>', 'extra query parameters to strip from image URLs')
    .option('--raw-image', 'strip width and height query parameters')
    .option('--no-watermark', 'strip the watermark query parameter')
    .option('-p, --parallel', 'download in parallel')
    .option('-c, --concurrency <n>', 'parallel workers when --parallel is set (default: 5)', toInt)
    .option('-l, --log', 'append run events to the log file')
    .option('--log-file <path>', 'log file for --log (default: image_downloader.log)')
    .option('--path-filter <substring>', 'only keep links whose path contains this (default: /orderfiles/, "" for all)')
    .option('--max-attempts <n>', 'attempts per image before giving up (default: 3)', toInt)
    .option('--timeout <ms>', 'per-request timeout in milliseconds (default: 10000)', toInt)
    .option('--no-skip-existing', 're-download files that already exist')
    .option('--summary <file>', 'write a JSON run summary to this file')
    .option('--user-agent <ua>', 'User-Agent header for requests');
}

export function toConfigInput(orderId: string, opts: CliOptions, env: Record<string, string | undefined> = process.env): RunConfigInput {
  const defaults = configDefaults(env);
  return {
    ...defaults,
    orderId,
    extensions: opts.extensions ?? defaults.extensions,
    outputDir: opts.output ?? defaults.outputDir,
    baseUrl: opts.baseUrl ?? defaults.baseUrl,
    extraParamsToRemove: opts.removeParams ?? defaults.extraParamsToRemove,
    removeWidthHeight: opts.rawImage ?? defaults.removeWidthHeight,
    removeWatermark: opts.watermark === false,
    parallel: opts.parallel ?? defaults.parallel,
    concurrency: opts.concurrency ?? defaults.concurrency,
    logEnabled: opts.log ?? defaults.logEnabled,
    logFile: opts.logFile ?? defaults.logFile,
    pathFilter: opts.pathFilter ?? defaults.pathFilter,
    maxAttempts: opts.maxAttempts ?? defaults.maxAttempts,
    timeoutMs: opts.timeout ?? defaults.timeoutMs,
    skipExisting: opts.skipExisting ?? defaults.skipExisting,
    userAgent: opts.userAgent ?? defaults.userAgent,
    ...(opts.summary ? { summaryFile: opts.summary } : {})
  };
}

/** Parses user arguments (no node/script prefix) into a validated RunConfig. */
export function parseArgs(argv: string[], env: Record<string, string | undefined> = process.env): RunConfig {
  const program = createProgram().exitOverride();
  program.parse(argv, { from: 'user' });
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`));
  }
  const opts = parsed.data;
  return parseRunConfig(toConfigInput(program.args[0], opts, env));
}
