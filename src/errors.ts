export class NetworkError extends Error {
  readonly url: string;
  readonly code?: string;

  constructor(url: string, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'NetworkError';
    this.url = url;
    this.code = options.code;
  }
}

export class HttpError extends Error {
  readonly url: string;
  readonly statusCode: number;

  constructor(url: string, statusCode: number, statusMessage?: string) {
    super(`HTTP ${statusCode}${statusMessage ? ` ${statusMessage}` : ''}: ${url}`);
    this.name = 'HttpError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

// Markup that cannot be scanned for links at all.
export class ParseError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export class FilesystemError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'FilesystemError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Timeouts, dropped connections, 5xx and 429 are worth another attempt.
 * Everything else (other 4xx, parse and filesystem errors) is terminal.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof NetworkError) return true;
  if (err instanceof HttpError) return err.statusCode === 429 || err.statusCode >= 500;
  return false;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
