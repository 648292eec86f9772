import { isDiagnosticArray } from '../../diagnostics/diagnostics.js';
import { FALLBACK_LANGUAGE } from '../../labels/types.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { info, printJson } from '../utils/logger.js';
import { openResolver, type ResolverCliOptions } from '../utils/resolver.js';

export interface FilesOptions extends ResolverCliOptions {
  language?: string;
  json?: boolean;
}

export async function filesCommand(packageName: string, modelName: string, options: FilesOptions = {}): Promise<void> {
  const language = options.language ?? FALLBACK_LANGUAGE;
  const resolver = await openResolver(options);
  const fileIds = await resolver.listAvailableLabelFiles(packageName, modelName, language);
  if (isDiagnosticArray(fileIds)) {
    throw createDiagnosticsError(fileIds);
  }

  if (options.json) {
    printJson(fileIds);
    return;
  }

  if (fileIds.length === 0) {
    info(`${packageName}/${modelName} 中没有 ${language} 标签文件`);
    return;
  }
  for (const fileId of fileIds) {
    console.log(fileId);
  }
}
