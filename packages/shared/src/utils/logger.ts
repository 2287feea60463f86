import { LOG_LEVELS } from '../constants/index';
import type { LogLevel } from '../types/index';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** 로그 출력 대상 (기본: console) */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/** stdout을 결과 출력에 쓰는 CLI용: 모든 레벨을 stderr로 */
export const stderrSink: LogSink = {
  debug: (...args: unknown[]) => console.error(...args),
  info: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
  error: (...args: unknown[]) => console.error(...args),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * console 기반 로거
 * 출력 형식: [scope] message  (레벨 미만 메시지는 버림)
 */
export function createLogger(scope: string, level: LogLevel = 'warn', sink: LogSink = console): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (target: LogLevel) => LOG_LEVELS.indexOf(target) >= threshold && level !== 'silent';
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled('debug')) sink.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled('info')) sink.info(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) sink.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      if (!enabled('error')) return;
      if (error === undefined) {
        sink.error(`${prefix} ${message}`);
      } else {
        sink.error(`${prefix} ${message}`, error);
      }
    },
  };
}

/** 아무것도 출력하지 않는 로거 */
export const silentLogger: Logger = createLogger('silent', 'silent');
