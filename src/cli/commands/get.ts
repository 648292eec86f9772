import { isDiagnosticArray } from '../../diagnostics/diagnostics.js';
import { FALLBACK_LANGUAGE, type LabelLookup } from '../../labels/types.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { field, printJson, warn } from '../utils/logger.js';
import { openResolver, type ResolverCliOptions } from '../utils/resolver.js';

export interface GetOptions extends ResolverCliOptions {
  language?: string;
  description?: boolean;
  json?: boolean;
}

export async function getCommand(reference: string, options: GetOptions = {}): Promise<void> {
  const resolver = await openResolver(options);
  const lookup = await resolver.resolveOne(reference, options.language ?? FALLBACK_LANGUAGE);
  if (isDiagnosticArray(lookup)) {
    throw createDiagnosticsError(lookup);
  }

  const description = options.description ? lookup.description : null;
  if (options.json) {
    printJson({ ...lookup, description });
    return;
  }

  field('Label', reference);
  field('Language', describeLanguage(lookup));
  if (!lookup.found) {
    warn(describeMiss(lookup));
    return;
  }

  field('Text', lookup.text);
  if (options.description) {
    field('Description', description);
  }
  field('File', lookup.filePath);
}

function describeLanguage(lookup: LabelLookup): string {
  if (lookup.fallbackApplied && lookup.resolvedLanguage) {
    return `${lookup.resolvedLanguage}（由 ${lookup.language} 回退）`;
  }
  return lookup.language;
}

function describeMiss(lookup: LabelLookup): string {
  switch (lookup.status) {
    case 'invalid-reference':
      return `无效的标签引用：${lookup.reference}`;
    case 'file-not-found':
      return `未找到 ${lookup.language} 的标签文件`;
    case 'read-failed':
      return `读取标签文件失败：${lookup.filePath ?? ''}`;
    case 'label-not-found':
    default:
      return `标签文件中不存在该标签：${lookup.filePath ?? ''}`;
  }
}
