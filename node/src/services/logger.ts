// node/src/services/logger.ts: structured logging for the assistant backend
import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveMinLevel(value: string | undefined): number {
  const name = (value ?? 'info').toLowerCase();
  return isLogLevelName(name) ? LOG_LEVELS[name] : LOG_LEVELS.info;
}

function resolveType(nodeEnv: string | undefined): 'pretty' | 'json' | 'hidden' {
  if (nodeEnv === 'test') return 'hidden';
  return nodeEnv === 'production' ? 'json' : 'pretty';
}

export type AppLogger = Logger<ILogObj>;

export const logger: AppLogger = new Logger<ILogObj>({
  name: 'city-assistant',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: resolveType(process.env.NODE_ENV),
});

/** Child logger tagged with a component name (`rag`, `tools`, `supervisor`, ...). */
export function componentLogger(name: string): AppLogger {
  return logger.getSubLogger({ name });
}
