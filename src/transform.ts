import { safeDecode } from './utils.js';
import type { TransformConfig } from './types.js';

const SIZE_PARAMS = ['width', 'height'];
const WATERMARK_PARAM = 'watermark';

export function paramsToRemove(config: TransformConfig): Set<string> {
  const keys = new Set<string>(config.extraParamsToRemove);
  if (config.removeWidthHeight) for (const k of SIZE_PARAMS) keys.add(k);
  if (config.removeWatermark) keys.add(WATERMARK_PARAM);
  return keys;
}

/**
 * Drops the configured query parameters from `url`.
 *
 * Works on the raw string: surviving `key=value` segments are kept byte for
 * byte and in their original order, so applying the same config again
 * returns the same string. Keys are compared after percent-decoding and
 * case-sensitively. Relative URLs are accepted.
 */
export function transformUrl(url: string, config: TransformConfig): string {
  const remove = paramsToRemove(config);
  if (remove.size === 0) return url;

  const hashAt = url.indexOf('#');
  const fragment = hashAt >= 0 ? url.slice(hashAt) : '';
  const beforeHash = hashAt >= 0 ? url.slice(0, hashAt) : url;

  const queryAt = beforeHash.indexOf('?');
  if (queryAt < 0) return url;

  const head = beforeHash.slice(0, queryAt);
  const segments = beforeHash.slice(queryAt + 1).split('&');
  const kept = segments.filter((segment) => !remove.has(segmentKey(segment)));
  if (kept.length === segments.length) return url;

  const query = kept.filter(Boolean).join('&');
  return `${head}${query ? `?${query}` : ''}${fragment}`;
}

function segmentKey(segment: string): string {
  const eq = segment.indexOf('=');
  const rawKey = eq >= 0 ? segment.slice(0, eq) : segment;
  return safeDecode(rawKey.replace(/\+/g, ' '));
}
