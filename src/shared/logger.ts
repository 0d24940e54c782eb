import pino, { type Logger, type LoggerOptions } from 'pino';
import { DEFAULT_LOG_LEVEL, DEFAULT_NODE_ENV } from './constants.js';

export interface LogSettings {
  level: string;
  pretty: boolean;
}

/**
 * Level and formatting for an environment. Pretty output only in
 * development, and only when stderr is a terminal.
 */
export function resolveLogSettings(source: NodeJS.ProcessEnv, isTTY: boolean): LogSettings {
  const nodeEnv = source.NODE_ENV ?? DEFAULT_NODE_ENV;
  const isTest = nodeEnv === 'test';
  return {
    level: source.LOG_LEVEL ?? (isTest ? 'silent' : DEFAULT_LOG_LEVEL),
    pretty: nodeEnv === 'development' && isTTY,
  };
}

const settings = resolveLogSettings(process.env, process.stderr.isTTY === true);
const usePretty = settings.pretty;

const errorSerializer = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
      ...('code' in error ? { code: error.code } : {}),
    };
  }
  return { value: error };
};

const baseOptions: LoggerOptions = {
  level: settings.level,
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
    bindings(bindings) {
      return {
        pid: bindings.pid,
      };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
            singleLine: true,
          },
        },
      }
    : {}),
};

// stdout belongs to the CLI output, logs go to stderr
const rootLogger: Logger = usePretty
  ? pino(baseOptions)
  : pino(baseOptions, pino.destination(2));

type ModuleName =
  | 'cli'
  | 'config'
  | 'cookies'
  | 'http'
  | 'judges'
  | 'problems';

const childLoggerCache = new Map<string, Logger>();

/**
 * Creates or retrieves a cached child logger for a specific module.
 * Child loggers automatically include the module name in all log output.
 */
export function getLogger(module: ModuleName, bindings?: Record<string, unknown>): Logger {
  const cacheKey = bindings ? `${module}:${JSON.stringify(bindings)}` : module;

  const cached = childLoggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const child = rootLogger.child({ module, ...bindings });
  childLoggerCache.set(cacheKey, child);
  return child;
}
