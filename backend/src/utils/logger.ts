import { config, type LogLevel } from './config.js';

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[config.LOG_LEVEL];
}

function format(level: LogLevel, ctx: string, msg: string, data?: unknown): string {
  const ts = new Date().toISOString().slice(11, 23);
  const prefix = `${ts} [${level.toUpperCase().padEnd(5)}] [${ctx}]`;
  return data !== undefined ? `${prefix} ${msg} ${JSON.stringify(data)}` : `${prefix} ${msg}`;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export function createLogger(ctx: string): Logger {
  return {
    debug: (msg, data) => { if (shouldLog('debug')) console.debug(format('debug', ctx, msg, data)); },
    info: (msg, data) => { if (shouldLog('info')) console.log(format('info', ctx, msg, data)); },
    warn: (msg, data) => { if (shouldLog('warn')) console.warn(format('warn', ctx, msg, data)); },
    error: (msg, data) => { if (shouldLog('error')) console.error(format('error', ctx, msg, data)); },
  };
}

export const log = {
  game: createLogger('Game'),
  room: createLogger('Room'),
  ws: createLogger('WS'),
  http: createLogger('HTTP'),
};
