import {
  DiagnosticCode,
  DiagnosticError,
  isDiagnosticArray,
  type Diagnostic,
} from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'configuration' | 'filesystem' | 'manifest' | 'reference' | 'unknown';

/** 携带诊断数组的 CLI 错误，由 handleError 统一输出 */
export class CliDiagnosticsError extends Error {
  constructor(readonly diagnostics: readonly Diagnostic[]) {
    super('CLI_DIAGNOSTIC_ERROR');
    this.name = 'CliDiagnosticsError';
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  switch (code) {
    case DiagnosticCode.LBL001_NotConfigured:
      return 'configuration';
    case DiagnosticCode.LBL002_InvalidReference:
      return 'reference';
    case DiagnosticCode.LBL003_LabelFileReadFailed:
      return 'filesystem';
    case DiagnosticCode.LBL101_LayerManifestInvalid:
    case DiagnosticCode.LBL102_LayerManifestNotFound:
      return 'manifest';
    default:
      return 'unknown';
  }
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'configuration':
      return '请设置 LABELS_PACKAGES_DIR 或通过 --root 指定包目录';
    case 'reference':
      return '标签引用格式应为 @LabelFileId:LabelId';
    case 'filesystem':
      return '请检查标签文件是否可读';
    case 'manifest':
      return '请检查 LABELS_LAYERS_FILE 指向的分层清单（{"version":1,"layers":[...]}）';
    default:
      return null;
  }
}

function printDiagnostics(diags: readonly Diagnostic[]): void {
  for (const diag of diags) {
    logError(`[${diag.code}] ${diag.message}`);
    const hint = hintFor(diag.code);
    if (hint) {
      logWarn(hint);
    }
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

export function createDiagnosticsError(diagnostics: readonly Diagnostic[]): CliDiagnosticsError {
  return new CliDiagnosticsError(diagnostics);
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
  } else if (error instanceof CliDiagnosticsError) {
    printDiagnostics(error.diagnostics);
  } else if (isDiagnosticArray(error)) {
    printDiagnostics(error);
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}
