/**
 * LabelResolver 标签解析门面
 *
 * 职责：
 * - 解析引用、定位标签文件并通过缓存读取标签表
 * - 请求语言的文件不存在时回退到 en-US（仅文件级回退）
 * - 批量解析时按 fileId 分组，每个文件只定位、解析一次
 */

import { performance } from 'node:perf_hooks';
import pLimit, { type LimitFunction } from 'p-limit';
import { ConfigService, normalizeConcurrency } from '../config/config-service.js';
import { loadLayerManifest } from '../config/layering.js';
import { isDiagnosticArray, type Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger, logPerformance, type Logger } from '../utils/logger.js';
import { LabelFileCache } from './label-cache.js';
import { LabelFileLocator } from './label-locator.js';
import { parseLabelReference } from './reference.js';
import {
  FALLBACK_LANGUAGE,
  type LabelBatchResult,
  type LabelLookup,
  type LabelLookupStatus,
  type LabelReference,
} from './types.js';

export interface LabelResolverOptions {
  readonly locator: LabelFileLocator;
  /** 默认为解析器独占的新缓存 */
  readonly cache?: LabelFileCache;
  readonly logger?: Logger;
  readonly allowLegacyReferences?: boolean;
  /** 批量解析时同时处理的文件组数；非正整数回退到默认值 */
  readonly concurrency?: number;
}

interface LocatedFile {
  readonly filePath: string;
  readonly language: string;
  readonly fallbackApplied: boolean;
}

interface GroupMember {
  readonly reference: string;
  readonly labelId: string;
}

export class LabelResolver {
  private readonly locator: LabelFileLocator;
  private readonly cache: LabelFileCache;
  private readonly logger: Logger;
  private readonly allowLegacyReferences: boolean;
  private readonly limit: LimitFunction;

  constructor(options: LabelResolverOptions) {
    this.locator = options.locator;
    this.logger = options.logger ?? createLogger('labels');
    this.cache = options.cache ?? new LabelFileCache({ logger: this.logger.child('cache') });
    this.allowLegacyReferences = options.allowLegacyReferences ?? false;
    this.limit = pLimit(
      options.concurrency === undefined ? ConfigService.getInstance().concurrency : normalizeConcurrency(options.concurrency)
    );
  }

  /**
   * 解析单个标签引用
   *
   * @param reference 形如 `@SYS:1234` 的引用
   * @param language 请求语言，默认 en-US
   * @returns 查找结果；根目录未配置时返回诊断数组
   */
  async resolveOne(reference: string, language: string = FALLBACK_LANGUAGE): Promise<LabelLookup | Diagnostic[]> {
    const rootError = await this.locator.checkRoot();
    if (rootError) return rootError;

    const parsed = this.parseReference(reference);
    if (!parsed) {
      return miss(reference, language, 'invalid-reference', null);
    }

    const located = await this.locate(parsed.fileId, language);
    if (isDiagnosticArray(located)) return located;
    if (!located) {
      this.logger.warn('Label file not found', { labelFileId: parsed.fileId, language });
      return miss(reference, language, 'file-not-found', null);
    }

    const load = await this.cache.getOrParse(located.filePath);
    if (!load.ok) {
      return miss(reference, language, 'read-failed', located);
    }

    const entry = load.table.get(parsed.labelId);
    if (!entry) {
      this.logger.warn('Label not found', { labelId: parsed.labelId, labelFile: located.filePath });
      return miss(reference, language, 'label-not-found', located);
    }

    return {
      reference,
      found: true,
      status: 'found',
      text: entry.text,
      description: entry.description ?? null,
      language,
      resolvedLanguage: located.language,
      fallbackApplied: located.fallbackApplied,
      filePath: located.filePath,
    };
  }

  /**
   * 批量解析标签引用
   *
   * 无效引用被记录并丢弃；有效引用按 fileId 分组，每组只定位、解析一次。
   * 缺失列表由调用方用 requested − found 计算。
   */
  async resolveBatch(
    references: readonly string[],
    language: string = FALLBACK_LANGUAGE
  ): Promise<LabelBatchResult | Diagnostic[]> {
    const started = performance.now();
    const rootError = await this.locator.checkRoot();
    if (rootError) return rootError;

    const groups = new Map<string, GroupMember[]>();
    for (const reference of references) {
      const parsed = this.parseReference(reference);
      if (!parsed) continue;
      const members = groups.get(parsed.fileId);
      if (members) {
        members.push({ reference, labelId: parsed.labelId });
      } else {
        groups.set(parsed.fileId, [{ reference, labelId: parsed.labelId }]);
      }
    }

    const groupResults = await Promise.all(
      [...groups].map(([fileId, members]) => this.limit(() => this.resolveGroup(fileId, members, language)))
    );

    const found = new Map<string, string>();
    for (const result of groupResults) {
      if (isDiagnosticArray(result)) return result;
      for (const [reference, text] of result) {
        found.set(reference, text);
      }
    }

    logPerformance(
      {
        component: 'labels',
        operation: 'resolveBatch',
        duration: performance.now() - started,
        metadata: { requested: references.length, files: groups.size, found: found.size },
      },
      this.logger
    );

    return {
      language,
      found,
      requestedCount: references.length,
      foundCount: found.size,
    };
  }

  /** 列出某个模型中提供指定标签文件的语言 */
  async listAvailableLanguages(packageName: string, modelName: string, fileId: string): Promise<string[] | Diagnostic[]> {
    return this.locator.listLanguages(packageName, modelName, fileId);
  }

  /**
   * 列出某个模型在指定语言下的标签文件 ID
   *
   * 返回去掉 `.{language}.label.txt` 后的裸 ID（`SYS`），而不是 `SYS.en-US`，
   * 可直接作为 listAvailableLanguages 的 fileId 参数。
   */
  async listAvailableLabelFiles(
    packageName: string,
    modelName: string,
    language: string = FALLBACK_LANGUAGE
  ): Promise<string[] | Diagnostic[]> {
    return this.locator.listLabelFiles(packageName, modelName, language);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private parseReference(reference: string): LabelReference | null {
    const parsed = parseLabelReference(reference, { allowLegacy: this.allowLegacyReferences });
    if (isDiagnosticArray(parsed)) {
      this.logger.warn('Invalid label reference format', { reference, code: parsed[0]?.code });
      return null;
    }
    return parsed;
  }

  /** 先按请求语言定位，找不到文件时回退到 en-US */
  private async locate(fileId: string, language: string): Promise<LocatedFile | null | Diagnostic[]> {
    const primary = await this.locator.find(fileId, language);
    if (isDiagnosticArray(primary)) return primary;
    if (primary) {
      return { filePath: primary, language, fallbackApplied: false };
    }
    if (language === FALLBACK_LANGUAGE) return null;

    this.logger.info('Label file not found for language, falling back', {
      labelFileId: fileId,
      language,
      fallback: FALLBACK_LANGUAGE,
    });
    const fallback = await this.locator.find(fileId, FALLBACK_LANGUAGE);
    if (isDiagnosticArray(fallback)) return fallback;
    return fallback ? { filePath: fallback, language: FALLBACK_LANGUAGE, fallbackApplied: true } : null;
  }

  private async resolveGroup(
    fileId: string,
    members: readonly GroupMember[],
    language: string
  ): Promise<Array<[string, string]> | Diagnostic[]> {
    const located = await this.locate(fileId, language);
    if (isDiagnosticArray(located)) return located;
    if (!located) {
      this.logger.warn('Label file not found', { labelFileId: fileId, language });
      return [];
    }

    const load = await this.cache.getOrParse(located.filePath);
    if (!load.ok) return [];

    const resolved: Array<[string, string]> = [];
    for (const { reference, labelId } of members) {
      const entry = load.table.get(labelId);
      if (entry) {
        resolved.push([reference, entry.text]);
      } else {
        this.logger.warn('Label not found', { labelId, labelFile: located.filePath });
      }
    }
    return resolved;
  }
}

function miss(
  reference: string,
  language: string,
  status: Exclude<LabelLookupStatus, 'found'>,
  located: LocatedFile | null
): LabelLookup {
  return {
    reference,
    found: false,
    status,
    text: null,
    description: null,
    language,
    resolvedLanguage: located?.language ?? null,
    fallbackApplied: located?.fallbackApplied ?? false,
    filePath: located?.filePath ?? null,
  };
}

export interface CreateLabelResolverOptions {
  /** 覆盖 LABELS_PACKAGES_DIR */
  readonly root?: string | null;
  /** 覆盖 LABELS_LAYERS_FILE */
  readonly layersFile?: string | null;
  readonly allowLegacyReferences?: boolean;
  readonly concurrency?: number;
  readonly logger?: Logger;
}

/**
 * 基于 ConfigService 配置构建解析器
 *
 * @returns 解析器；分层清单无效时返回诊断数组
 */
export async function createLabelResolver(
  options: CreateLabelResolverOptions = {}
): Promise<LabelResolver | Diagnostic[]> {
  const config = ConfigService.getInstance();
  const logger = options.logger ?? createLogger('labels');
  const root = options.root !== undefined ? options.root : config.packagesDir;
  const layersFile = options.layersFile !== undefined ? options.layersFile : config.layersFile;

  let layers: readonly string[] = [];
  if (layersFile) {
    const loaded = await loadLayerManifest(layersFile);
    if (isDiagnosticArray(loaded)) return loaded;
    layers = loaded;
  }

  return new LabelResolver({
    locator: new LabelFileLocator({ root, layers, logger: logger.child('locator') }),
    logger,
    allowLegacyReferences: options.allowLegacyReferences ?? config.legacyReferences,
    concurrency: options.concurrency ?? config.concurrency,
  });
}
