/* Structured JSON logger; one line per event */
import { config } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  log(level: LogLevel, msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
};

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, v);
}

const envLevel: LogLevel = isLogLevel(config.logLevel) ? config.logLevel : 'info';

export function createLogger(bindings: Record<string, unknown> = {}, minLevel: LogLevel = envLevel): Logger {
  const self: Logger = {
    log(level, msg, meta = {}) {
      if (levelOrder[level] < levelOrder[minLevel]) return;
      const line = {
        ts: new Date().toISOString(),
        level,
        msg,
        ...bindings,
        ...meta,
      };
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(line));
    },
    debug: (msg, meta) => self.log('debug', msg, meta),
    info: (msg, meta) => self.log('info', msg, meta),
    warn: (msg, meta) => self.log('warn', msg, meta),
    error: (msg, meta) => self.log('error', msg, meta),
    child: (extra) => createLogger({ ...bindings, ...extra }, minLevel),
  };
  return self;
}

export const logger = createLogger({ service: 'officer-kinship' });
