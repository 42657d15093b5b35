import pino, { type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from '../config.js';

type LogSettings = AppConfig['log'];

function settingsFromEnv(env: NodeJS.ProcessEnv): LogSettings {
  const pretty = env.LOG_PRETTY
    ? env.LOG_PRETTY === 'true'
    : env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';
  return { level: toLevel(env.LOG_LEVEL ?? 'info'), pretty };
}

function toLevel(value: string): LogSettings['level'] {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'debug':
    case 'trace':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

/**
 * Options shared by the module loggers and the Fastify request logger,
 * so both write the same format.
 */
export function buildLoggerOptions(settings: LogSettings): LoggerOptions {
  const options: LoggerOptions = { level: settings.level };
  if (settings.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }
  return options;
}

const root: Logger = pino(buildLoggerOptions(settingsFromEnv(process.env)));

export function getLogger(module: string): Logger {
  return root.child({ module });
}
