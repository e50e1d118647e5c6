import path from 'node:path';

export function sleep(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\/\\:*?"<>|\u0000-\u001f]/g, '-')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '');
  return base || 'file';
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href.trim(), baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function urlBasename(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    const last = path.posix.basename(u.pathname);
    return safeDecode(last) || 'file';
  } catch {
    return 'file';
  }
}

// Lowercased extension of the URL path, with the leading dot; '' when there is none.
export function urlExtension(urlStr: string): string {
  try {
    return path.posix.extname(new URL(urlStr).pathname).toLowerCase();
  } catch {
    return '';
  }
}

export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function safeDecode(input: string): string {
  try {
    return decodeURIComponent(input);
  } catch {
    return input;
  }
}
