import { isDiagnosticArray } from '../../diagnostics/diagnostics.js';
import { createLabelResolver, type LabelResolver } from '../../labels/label-resolver.js';
import { createDiagnosticsError } from './error-handler.js';

export interface ResolverCliOptions {
  /** 覆盖 LABELS_PACKAGES_DIR */
  root?: string;
}

/**
 * 按命令行参数与环境变量构建解析器，配置错误以诊断异常抛出
 */
export async function openResolver(options: ResolverCliOptions): Promise<LabelResolver> {
  const resolver = await createLabelResolver(options.root === undefined ? {} : { root: options.root });
  if (isDiagnosticArray(resolver)) {
    throw createDiagnosticsError(resolver);
  }
  return resolver;
}
