import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

// Thin wrapper around pino with a console fallback.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'true' to enable the pino-pretty transport
// - USE_PINO: 'false' to force the console fallback

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppLogger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug: (obj: object, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => AppLogger;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function getLevelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug': return 10;
    case 'info': return 20;
    case 'warn': return 30;
    case 'error': return 40;
    case 'silent': return 100;
  }
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

function should(method: LogLevel): boolean {
  return getLevelOrder(method) >= getLevelOrder(currentLevel);
}

function createConsoleWrapper(bindings: Record<string, unknown> = {}): AppLogger {
  const prefix = Object.keys(bindings).length > 0
    ? `[${Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
    : '';
  return {
    info: (obj, msg) => { if (should('info')) console.log(prefix, msg || '', obj); },
    warn: (obj, msg) => { if (should('warn')) console.warn(prefix, msg || '', obj); },
    error: (obj, msg) => { if (should('error')) console.error(prefix, msg || '', obj); },
    debug: (obj, msg) => { if (should('debug')) console.debug(prefix, msg || '', obj); },
    child: (more) => createConsoleWrapper({ ...bindings, ...more }),
  };
}

function wrapPino(base: Logger): AppLogger {
  return {
    info: (obj, msg) => { if (should('info')) base.info(obj, msg); },
    warn: (obj, msg) => { if (should('warn')) base.warn(obj, msg); },
    error: (obj, msg) => { if (should('error')) base.error(obj, msg); },
    debug: (obj, msg) => { if (should('debug')) base.debug(obj, msg); },
    child: (bindings) => wrapPino(base.child(bindings)),
  };
}

function createPinoLogger(): Logger | null {
  if (process.env.USE_PINO === 'false') {
    return null;
  }

  // Filtering happens in wrapPino so child loggers follow setLogLevel
  const options: LoggerOptions = { level: 'debug' };
  if (process.env.LOG_PRETTY === 'true') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }

  try {
    return pino(options);
  } catch {
    // Transport worker failed to start; keep structured output without it
    return pino({ level: 'debug' });
  }
}

const pinoLogger = createPinoLogger();
const baseLogger: AppLogger = pinoLogger ? wrapPino(pinoLogger) : createConsoleWrapper();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function getLogger(bindings?: Record<string, unknown>): AppLogger {
  if (bindings && Object.keys(bindings).length > 0) {
    return baseLogger.child(bindings);
  }
  return baseLogger;
}
