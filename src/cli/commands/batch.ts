import { isDiagnosticArray } from '../../diagnostics/diagnostics.js';
import { FALLBACK_LANGUAGE } from '../../labels/types.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { info, printJson, success, warn } from '../utils/logger.js';
import { openResolver, type ResolverCliOptions } from '../utils/resolver.js';

export interface BatchOptions extends ResolverCliOptions {
  language?: string;
  json?: boolean;
}

export interface BatchReport {
  readonly language: string;
  readonly totalRequested: number;
  readonly totalFound: number;
  readonly labels: Record<string, string>;
  readonly missingLabels: string[];
}

export async function batchCommand(references: readonly string[], options: BatchOptions = {}): Promise<void> {
  const resolver = await openResolver(options);
  const result = await resolver.resolveBatch(references, options.language ?? FALLBACK_LANGUAGE);
  if (isDiagnosticArray(result)) {
    throw createDiagnosticsError(result);
  }

  const report: BatchReport = {
    language: result.language,
    totalRequested: result.requestedCount,
    totalFound: result.foundCount,
    labels: Object.fromEntries(result.found),
    missingLabels: references.filter(reference => !result.found.has(reference)),
  };

  if (options.json) {
    printJson(report);
    return;
  }

  const summary = `${report.totalFound}/${report.totalRequested} 个标签已解析（${report.language}）`;
  if (report.missingLabels.length === 0) {
    success(summary);
  } else {
    info(summary);
  }
  for (const [reference, text] of result.found) {
    console.log(`${reference} | ${text}`);
  }
  if (report.missingLabels.length > 0) {
    warn(`未找到：${report.missingLabels.join(', ')}`);
  }
}
