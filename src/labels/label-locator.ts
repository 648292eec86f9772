/**
 * LabelFileLocator 标签文件定位器
 *
 * 目录布局：
 * ```
 * {root}/{package}/{model}/AxLabelFile/LabelResources/{language}/{fileId}.{language}.label.txt
 * ```
 * 同一 fileId/language 可能由多个包/模型提供，按枚举顺序最后找到的文件胜出
 * （定制包覆盖标准包）。包与模型按名称的码元顺序枚举；分层清单中列出的包
 * 排在所有未列出的包之后，并按清单顺序排列。
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger, type Logger } from '../utils/logger.js';

const LABEL_RESOURCES = ['AxLabelFile', 'LabelResources'] as const;
const LABEL_FILE_EXTENSION = '.label.txt';

export interface LabelFileLocatorOptions {
  /** 包目录根路径；null 表示未配置 */
  readonly root: string | null;
  /** 分层清单，按优先级升序 */
  readonly layers?: readonly string[];
  readonly logger?: Logger;
}

export class LabelFileLocator {
  readonly root: string | null;
  private readonly layers: readonly string[];
  private readonly logger: Logger;

  constructor(options: LabelFileLocatorOptions) {
    this.root = options.root === null ? null : resolve(options.root);
    this.layers = options.layers ?? [];
    this.logger = options.logger ?? createLogger('labels.locator');
  }

  /**
   * 检查根目录是否可用
   *
   * @returns 根目录存在时返回 null，否则返回 NotConfigured 诊断
   */
  async checkRoot(): Promise<Diagnostic[] | null> {
    if (this.root === null) {
      return [Diagnostics.notConfigured('LABELS_PACKAGES_DIR is not set').build()];
    }
    if (!(await isDirectory(this.root))) {
      this.logger.warn('Packages directory not found', { packagesDirectory: this.root });
      return [Diagnostics.notConfigured(`${this.root} does not exist or is not a directory`).build()];
    }
    return null;
  }

  /**
   * 在所有包/模型中查找标签文件
   *
   * @returns 胜出文件的路径；不存在时为 null；根目录不可用时为诊断数组
   */
  async find(fileId: string, language: string): Promise<string | null | Diagnostic[]> {
    const rootError = await this.checkRoot();
    if (rootError) return rootError;
    if (this.root === null || !isPlainSegment(fileId) || !isPlainSegment(language)) {
      return null;
    }

    const modelDirs = await this.enumerateModels(this.root);
    const candidates = modelDirs.map(modelDir => labelFilePath(modelDir, language, fileId));
    const present = await Promise.all(candidates.map(isFile));

    for (let i = candidates.length - 1; i >= 0; i--) {
      const candidate = candidates[i];
      if (present[i] && candidate !== undefined) {
        this.logger.debug('Found label file', { labelFile: candidate, matches: present.filter(Boolean).length });
        return candidate;
      }
    }
    return null;
  }

  /**
   * 列出某个模型中提供指定标签文件的语言
   */
  async listLanguages(packageName: string, modelName: string, fileId: string): Promise<string[] | Diagnostic[]> {
    const rootError = await this.checkRoot();
    if (rootError) return rootError;
    if (this.root === null || ![packageName, modelName, fileId].every(isPlainSegment)) {
      return [];
    }

    const modelDir = join(this.root, packageName, modelName);
    const languages = await this.listSubdirectories(join(modelDir, ...LABEL_RESOURCES));
    const present = await Promise.all(languages.map(language => isFile(labelFilePath(modelDir, language, fileId))));
    return languages.filter((_, i) => present[i]);
  }

  /**
   * 列出某个模型在指定语言下的全部标签文件 ID
   */
  async listLabelFiles(packageName: string, modelName: string, language: string): Promise<string[] | Diagnostic[]> {
    const rootError = await this.checkRoot();
    if (rootError) return rootError;
    if (this.root === null || ![packageName, modelName, language].every(isPlainSegment)) {
      return [];
    }

    const languageDir = join(this.root, packageName, modelName, ...LABEL_RESOURCES, language);
    const entries = await this.readEntries(languageDir);
    const languageSuffix = `.${language}${LABEL_FILE_EXTENSION}`;
    const fileIds = new Set<string>();
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(LABEL_FILE_EXTENSION)) continue;
      const suffix = entry.name.endsWith(languageSuffix) ? languageSuffix : LABEL_FILE_EXTENSION;
      const fileId = entry.name.slice(0, -suffix.length);
      if (fileId) fileIds.add(fileId);
    }
    return [...fileIds].sort(compareOrdinal);
  }

  /** 按分层顺序返回所有模型目录 */
  private async enumerateModels(root: string): Promise<string[]> {
    const packages = orderPackages(await this.listSubdirectories(root), this.layers);
    const modelsByPackage = await Promise.all(
      packages.map(async packageName => {
        const packageDir = join(root, packageName);
        const models = await this.listSubdirectories(packageDir);
        return models.map(model => join(packageDir, model));
      })
    );
    return modelsByPackage.flat();
  }

  /** 目录下的直接子目录名（含指向目录的符号链接），按码元顺序排序 */
  private async listSubdirectories(dir: string): Promise<string[]> {
    const entries = await this.readEntries(dir);
    const names = await Promise.all(
      entries.map(async entry => {
        if (entry.isDirectory()) return entry.name;
        if (entry.isSymbolicLink() && (await isDirectory(join(dir, entry.name)))) return entry.name;
        return null;
      })
    );
    return names.filter((name): name is string => name !== null).sort(compareOrdinal);
  }

  private async readEntries(dir: string): Promise<Dirent[]> {
    try {
      return await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code !== 'ENOENT' && error.code !== 'ENOTDIR') {
        this.logger.error('Error reading directory', error, { directory: dir });
      }
      return [];
    }
  }
}

export function labelFilePath(modelDir: string, language: string, fileId: string): string {
  return join(modelDir, ...LABEL_RESOURCES, language, `${fileId}.${language}${LABEL_FILE_EXTENSION}`);
}

/**
 * 未列入分层清单的包在前（按名称排序），清单中的包按清单顺序在后
 */
export function orderPackages(packages: readonly string[], layers: readonly string[]): string[] {
  const present = new Set(packages);
  const layered = new Set(layers);
  const unlisted = packages.filter(name => !layered.has(name)).sort(compareOrdinal);
  const listed = layers.filter(name => present.has(name));
  return [...unlisted, ...listed];
}

export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isPlainSegment(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..' && !/[\\/\0]/.test(segment);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
