/**
 * @module label-resolver
 *
 * 从本地元数据包目录解析标签引用（`@FileId:LabelId`）对应的显示文本。
 *
 * **解析管道**：
 * ```
 * 引用 → parseLabelReference → LabelFileLocator.find（分层 + en-US 回退）
 *      → LabelFileCache.getOrParse ↔ parseLabelFileContent → LabelLookup
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { createLabelResolver, isDiagnosticArray } from 'label-resolver';
 *
 * const resolver = await createLabelResolver({ root: '/metadata/PackagesLocalDirectory' });
 * if (!isDiagnosticArray(resolver)) {
 *   const lookup = await resolver.resolveOne('@SYS:1234', 'de-DE');
 *   const batch = await resolver.resolveBatch(['@SYS:1', '@SYS:2', '@Fleet:Title']);
 * }
 * ```
 */

// 标签解析
export * from './labels/index.js';

// 配置
export { ConfigService, DEFAULT_CONCURRENCY, normalizeConcurrency } from './config/config-service.js';
export { loadLayerManifest, parseLayerManifest } from './config/layering.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  isDiagnosticArray,
  type Diagnostic,
} from './diagnostics/index.js';

// 日志
export { Logger, LogLevel, createLogger, type LogMetadata, type LogSink } from './utils/logger.js';

// 基础类型
export type { Position, Span } from './types.js';
