/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * - `LOG_LEVEL`：日志级别（DEBUG / INFO / WARN / ERROR，默认 INFO）
 * - `ELAB_PASSES`：逗号分隔的细化 pass 名称，未设置时运行全部已注册 pass
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const passes = config.elabPasses ?? DEFAULT_PASS_ORDER;
 * ```
 */

import { LogLevel } from '../utils/logger.js';

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

  /** 显式指定的 pass 列表；null 表示使用默认顺序 */
  readonly elabPasses: readonly string[] | null;

  /** 初始化时读取的 ELAB_PASSES 原始值，便于检测环境变量变更 */
  private readonly cachedElabPassesRaw: string | undefined;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.cachedElabPassesRaw = process.env.ELAB_PASSES;
    this.elabPasses = this.parsePassList(this.cachedElabPassesRaw);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
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

  // 空串或只含分隔符视为未设置
  private parsePassList(raw: string | undefined): readonly string[] | null {
    if (raw === undefined) return null;
    const names = raw
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0);
    return names.length > 0 ? names : null;
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * 首次调用时创建实例；ELAB_PASSES 变化后重新读取环境变量。
   */
  static getInstance(): ConfigService {
    if (
      ConfigService.instance !== null &&
      ConfigService.instance.cachedElabPassesRaw !== process.env.ELAB_PASSES
    ) {
      ConfigService.instance = null;
    }

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
