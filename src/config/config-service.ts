/**
 * @module config-service
 *
 * 进程级配置服务：集中读取环境变量。
 *
 * 语言配置（模式、严格策略、恢复策略）不从这里读取，而是作为参数显式传入每次构建；
 * 这里只保存与进程相关的开关（日志级别、构建器调试输出）。
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * if (ConfigService.getInstance().debugBuilder) {
 *   // 输出逐节点跟踪
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，配置项在实例生命周期内保持不变。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否输出构建器逐节点跟踪（默认 false，设置 JSIR_DEBUG_BUILDER=1 启用） */
  readonly debugBuilder: boolean;

  private constructor() {
    this.logLevel = ConfigService.parseLogLevel(process.env.LOG_LEVEL);
    this.debugBuilder = process.env.JSIR_DEBUG_BUILDER === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量，未知取值回退到 INFO。
   */
  static parseLogLevel(raw: string | undefined): LogLevel {
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

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
