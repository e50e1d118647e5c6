import * as cheerio from 'cheerio';
import { ParseError } from './errors.js';
import { ensureAbsoluteUrl, normalizeExtension, urlExtension } from './utils.js';
import type { ImageReference } from './types.js';

/** Yields resource-location attribute values in document order. */
export interface TagScanner {
  scan(html: string): string[];
}

export class CheerioTagScanner implements TagScanner {
  scan(html: string): string[] {
    const $ = cheerio.load(html);
    const values: string[] = [];
    $('a[href], img[src], img[srcset], source[srcset]').each((_, el) => {
      const node = $(el);
      for (const attr of ['href', 'src']) {
        const v = node.attr(attr);
        if (v) values.push(v);
      }
      const srcset = node.attr('srcset');
      if (srcset) values.push(...parseSrcset(srcset));
    });
    return values;
  }
}

// "a.jpg 1x, b.jpg 2x" -> ["a.jpg", "b.jpg"]
export function parseSrcset(srcset: string): string[] {
  return srcset
    .split(',')
    .map((candidate) => candidate.trim().split(/\s+/)[0])
    .filter((url): url is string => Boolean(url));
}

export type ExtractOptions = {
  pathFilter?: string; // keep only URLs whose path contains this substring
  scanner?: TagScanner;
};

const defaultScanner = new CheerioTagScanner();

export function extractImageLinks(
  html: string,
  baseUrl: string,
  allowedExtensions: Iterable<string>,
  opts: ExtractOptions = {}
): ImageReference[] {
  assertMarkup(html);

  const allowed = new Set(Array.from(allowedExtensions, normalizeExtension));
  const scanner = opts.scanner ?? defaultScanner;

  let values: string[];
  try {
    values = scanner.scan(html);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Listing page could not be parsed: ${reason}`, { cause: err });
  }

  const seen = new Set<string>();
  const refs: ImageReference[] = [];
  for (const value of values) {
    const abs = ensureAbsoluteUrl(baseUrl, value);
    if (!abs || seen.has(abs)) continue;
    const u = new URL(abs);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') continue;
    if (opts.pathFilter && !u.pathname.includes(opts.pathFilter)) continue;
    const extension = urlExtension(abs);
    if (!allowed.has(extension)) continue;
    seen.add(abs);
    refs.push(Object.freeze({ url: abs, extension }));
  }
  return refs;
}

function assertMarkup(html: string) {
  if (!html.trim()) throw new ParseError('Listing page is empty');
  if (html.includes('\u0000')) throw new ParseError('Listing page is binary, not markup');
  if (!/<[a-zA-Z!?\/]/.test(html)) throw new ParseError('Listing page contains no markup');
}
