import { isDiagnosticArray } from '../../diagnostics/diagnostics.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { info, printJson } from '../utils/logger.js';
import { openResolver, type ResolverCliOptions } from '../utils/resolver.js';

export interface LanguagesOptions extends ResolverCliOptions {
  json?: boolean;
}

export async function languagesCommand(
  packageName: string,
  modelName: string,
  fileId: string,
  options: LanguagesOptions = {}
): Promise<void> {
  const resolver = await openResolver(options);
  const languages = await resolver.listAvailableLanguages(packageName, modelName, fileId);
  if (isDiagnosticArray(languages)) {
    throw createDiagnosticsError(languages);
  }

  if (options.json) {
    printJson(languages);
    return;
  }

  if (languages.length === 0) {
    info(`${packageName}/${modelName} 中没有 ${fileId} 的标签文件`);
    return;
  }
  for (const language of languages) {
    console.log(language);
  }
}
