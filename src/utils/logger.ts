/**
 * @module utils/logger
 *
 * 编译器内部的结构化日志。每条日志是一行 JSON，写到 stderr；
 * stdout 留给 CLI 命令的输出。
 *
 * 组件名按 `pipeline:parse` 形式分层，由 {@link Logger.child} 派生。
 */

import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogMetadata = Record<string, unknown>;

/** 单条日志的序列化形式 */
export interface LogEntry extends LogMetadata {
  level: keyof typeof LogLevel;
  timestamp: string;
  component: string;
  message: string;
}

export class Logger {
  constructor(
    readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO
  ) {}

  /** 派生子组件日志器，沿用当前级别 */
  child(scope: string): Logger {
    return new Logger(`${this.component}:${scope}`, this.minLevel);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, cause?: Error, meta?: LogMetadata): void {
    this.write(LogLevel.ERROR, message, cause ? { error: cause.message, stack: cause.stack, ...meta } : meta);
  }

  /**
   * 执行 `fn` 并以 DEBUG 级别记录耗时（毫秒，保留两位小数）。
   * `describe` 可以根据返回值补充元数据。
   */
  time<T>(operation: string, fn: () => T, describe?: (value: T) => LogMetadata): T {
    const start = performance.now();
    const value = fn();
    if (this.isEnabled(LogLevel.DEBUG)) {
      this.debug(`${operation} completed`, {
        duration_ms: roundMs(performance.now() - start),
        ...(describe ? describe(value) : {}),
      });
    }
    return value;
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      level: levelName(level),
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };
    console.error(JSON.stringify(entry));
  }
}

function levelName(level: LogLevel): keyof typeof LogLevel {
  switch (level) {
    case LogLevel.DEBUG:
      return 'DEBUG';
    case LogLevel.INFO:
      return 'INFO';
    case LogLevel.WARN:
      return 'WARN';
    case LogLevel.ERROR:
      return 'ERROR';
  }
}

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

/** 汇总耗时，写到 `performance:<component>` */
export function logPerformance(metrics: PerformanceMetrics): void {
  createLogger('performance')
    .child(metrics.component)
    .debug(`${metrics.operation} completed`, { duration_ms: roundMs(metrics.duration), ...metrics.metadata });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
