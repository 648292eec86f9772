/**
 * @module labels
 *
 * 标签解析引擎：引用解析、分层文件定位、标签文件解析、按路径缓存与批量解析。
 */

export { parseLabelReference, formatLabelReference, type ReferenceParseOptions } from './reference.js';
export { parseLabelFileContent, readLabelFile } from './label-file-parser.js';
export { LabelFileCache, type LabelFileCacheOptions, type LabelFileLoader } from './label-cache.js';
export {
  LabelFileLocator,
  labelFilePath,
  orderPackages,
  type LabelFileLocatorOptions,
} from './label-locator.js';
export {
  LabelResolver,
  createLabelResolver,
  type CreateLabelResolverOptions,
  type LabelResolverOptions,
} from './label-resolver.js';
export {
  FALLBACK_LANGUAGE,
  type LabelBatchResult,
  type LabelEntry,
  type LabelFileLoad,
  type LabelLookup,
  type LabelLookupStatus,
  type LabelReference,
  type LabelTable,
} from './types.js';
