import { createLogger, type Logger } from '@simplelang/logger';
import { loadConfig, type SimpleLangConfig } from './config.js';
import type { Write } from './reporter.js';

export interface CliContext {
  config: SimpleLangConfig;
  logger: Logger;
  write: Write;
}

/**
 * Configuration, a logger on stderr and stdout for reports.
 * Logs stay quiet below warn unless SIMPLELANG_ENV or SIMPLELANG_LOG_LEVEL say otherwise.
 */
export function createCliContext(cwd: string = process.cwd()): CliContext {
  const config = loadConfig(cwd);
  const logger = createLogger({
    environment: config.environment ?? 'production',
    minLevel: config.logLevel,
    write: (line) => console.error(line),
  }).child({ cli: 'simplelang' });

  return {
    config,
    logger,
    write: (line) => console.log(line),
  };
}
