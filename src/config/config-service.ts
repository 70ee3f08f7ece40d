/**
 * @module config-service
 *
 * 配置服务：编译器与解释器读取的环境变量只在这里解析。
 *
 * | 变量 | 含义 | 默认值 |
 * |---|---|---|
 * | `LOG_LEVEL` | 日志级别（debug/info/warn/error） | info |
 * | `CINDER_DEBUG_PARSER` | 为 `1` 时输出解析器跟踪日志 | 关闭 |
 * | `CINDER_MAX_STEPS` | 解释器执行步数上限 | 1000000 |
 * | `CINDER_TOPLEVEL_NAME` | 顶层语句合成函数名 | `__toplevel` |
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.debugParser) {
 *   // 解析器跟踪日志
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_MAX_STEPS = 1_000_000;
export const DEFAULT_TOPLEVEL_NAME = '__toplevel';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否输出解析器跟踪日志（设置 CINDER_DEBUG_PARSER=1 启用） */
  readonly debugParser: boolean;

  /** IR 解释器的执行步数上限（默认 1,000,000） */
  readonly maxSteps: number;

  /** 承载顶层语句的合成函数名（默认 __toplevel） */
  readonly toplevelFunctionName: string;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.debugParser = process.env.CINDER_DEBUG_PARSER === '1';
    this.maxSteps = this.parsePositiveInt(process.env.CINDER_MAX_STEPS, DEFAULT_MAX_STEPS);
    this.toplevelFunctionName = this.parseIdentifier(process.env.CINDER_TOPLEVEL_NAME, DEFAULT_TOPLEVEL_NAME);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : fallback;
  }

  // 非法标识符回退到默认值
  private parseIdentifier(raw: string | undefined, fallback: string): string {
    if (!raw) return fallback;
    return IDENTIFIER_PATTERN.test(raw) ? raw : fallback;
  }

  /**
   * 获取 ConfigService 单例实例。
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * **警告**：此方法仅应在测试环境中使用，生产代码不应调用。
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
