/**
 * LabelFileCache 标签文件缓存
 *
 * 以解析后的绝对路径为键缓存标签表。条目只在首次解析成功时写入，
 * 没有过期机制，只能通过 clear() 整体清空。
 */

import { resolve } from 'node:path';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { readLabelFile } from './label-file-parser.js';
import type { LabelFileLoad, LabelTable } from './types.js';

export type LabelFileLoader = (filePath: string) => Promise<LabelTable>;

export interface LabelFileCacheOptions {
  /** 读取并解析单个文件，默认 readLabelFile */
  readonly loader?: LabelFileLoader;
  readonly logger?: Logger;
}

export class LabelFileCache {
  private readonly tables = new Map<string, LabelTable>();
  private readonly loader: LabelFileLoader;
  private readonly logger: Logger;
  // 每次 clear() 递增，用于丢弃清空前发起的读取结果
  private generation = 0;

  constructor(options: LabelFileCacheOptions = {}) {
    this.loader = options.loader ?? readLabelFile;
    this.logger = options.logger ?? createLogger('labels.cache');
  }

  get size(): number {
    return this.tables.size;
  }

  has(filePath: string): boolean {
    return this.tables.has(resolve(filePath));
  }

  /**
   * 返回缓存的标签表；未命中时读取并解析文件
   *
   * 同一路径的并发未命中可能各自解析一次，先写入者胜出，之后所有读者看到同一张表。
   * 读取失败不写入缓存，下次调用会重新读取。
   */
  async getOrParse(filePath: string): Promise<LabelFileLoad> {
    const key = resolve(filePath);
    const cached = this.tables.get(key);
    if (cached) {
      return { ok: true, table: cached };
    }

    const generation = this.generation;
    let table: LabelTable;
    try {
      table = await this.loader(key);
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      const diagnostic = Diagnostics.labelFileReadFailed(key, error.message).build();
      this.logger.error(diagnostic.message, error, { filePath: key, code: diagnostic.code });
      return { ok: false, error };
    }

    if (generation !== this.generation) {
      return { ok: true, table };
    }

    const winner = this.tables.get(key);
    if (winner) {
      return { ok: true, table: winner };
    }

    this.tables.set(key, table);
    this.logger.info('Parsed label file', { filePath: key, count: table.size });
    return { ok: true, table };
  }

  clear(): void {
    const dropped = this.tables.size;
    this.tables.clear();
    this.generation++;
    this.logger.info('Label cache cleared', { dropped });
  }
}
