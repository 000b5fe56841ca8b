import { Logger, type ILogObj } from 'tslog';
import type { LogLevel } from '@/config/app.config';

const LEVEL_IDS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger: Logger<ILogObj> = new Logger({
  name: 'catalog-service',
  minLevel: LEVEL_IDS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: 'pretty',
});

/** Applies the configured level. Called once at startup. */
export function configureLogger(level: LogLevel): void {
  logger.settings.minLevel = LEVEL_IDS[level];
}
