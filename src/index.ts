#!/usr/bin/env node
import 'dotenv/config';
import { CommanderError } from 'commander';
import { parseArgs } from './cli.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { exitCodeFor, runOrder } from './run.js';

async function main() {
  const config = parseArgs(process.argv.slice(2));
  const log = createLogger({ logFile: config.logEnabled ? config.logFile : undefined });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('[run] interrupted: letting in-flight downloads finish, no new ones will start');
    controller.abort();
  });

  const summary = await runOrder(config, {
    logger: log,
    signal: controller.signal,
    onProgress: (done, total) => {
      if (done % 10 === 0 || done === total) console.log(`[download] ${done}/${total}`);
    }
  });
  process.exitCode = exitCodeFor(summary);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    process.exit(err.exitCode);
  }
  if (err instanceof ConfigError) {
    for (const issue of err.issues) console.error(`[config] ${issue}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
