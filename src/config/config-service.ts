/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.packagesDir) {
 *   // 在该目录下查找标签文件
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_CONCURRENCY = 8;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 包目录根路径（LABELS_PACKAGES_DIR），未设置时为 null */
  readonly packagesDir: string | null;

  /** 分层清单文件路径（LABELS_LAYERS_FILE，可选） */
  readonly layersFile: string | null;

  /** 是否接受旧式 `@SYS13342` 引用（LABELS_LEGACY_REFERENCES=1 启用） */
  readonly legacyReferences: boolean;

  /** 批量解析时并行处理的标签文件数（LABELS_CONCURRENCY，默认 8） */
  readonly concurrency: number;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  private constructor() {
    this.packagesDir = readPackagesDir();
    this.layersFile = process.env.LABELS_LAYERS_FILE?.trim() || null;
    this.legacyReferences = process.env.LABELS_LEGACY_REFERENCES === '1';
    this.concurrency = this.parseConcurrency(process.env.LABELS_CONCURRENCY);
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
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

  private parseConcurrency(raw: string | undefined): number {
    return raw ? normalizeConcurrency(Number(raw)) : DEFAULT_CONCURRENCY;
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * 首次调用时创建实例；LABELS_PACKAGES_DIR 变化后重新读取环境变量。
   *
   * @returns ConfigService 实例
   */
  static getInstance(): ConfigService {
    if (
      ConfigService.instance !== null &&
      ConfigService.instance.packagesDir !== readPackagesDir()
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

/** 非正整数一律回退到默认值 */
export function normalizeConcurrency(value: number | undefined): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : DEFAULT_CONCURRENCY;
}

function readPackagesDir(): string | null {
  return process.env.LABELS_PACKAGES_DIR?.trim() || null;
}
