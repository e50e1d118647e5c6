import pino from 'pino';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LoggerOptions = {
  logFile?: string; // append JSON lines here when set
  console?: boolean;
};

/**
 * Console lines go out as given ("[download] ok: ..."); the optional log
 * file gets the same message as a pino record with an ISO time and level.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const useConsole = opts.console ?? true;
  const file = opts.logFile
    ? pino(
        {
          base: null,
          timestamp: pino.stdTimeFunctions.isoTime,
          formatters: { level: (label) => ({ level: label }) }
        },
        pino.destination({ dest: opts.logFile, append: true, sync: true, mkdir: true })
      )
    : null;

  return {
    info(message) {
      if (useConsole) console.log(message);
      file?.info(message);
    },
    warn(message) {
      if (useConsole) console.warn(message);
      file?.warn(message);
    },
    error(message) {
      if (useConsole) console.error(message);
      file?.error(message);
    }
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
};
