import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { LabelReference } from './types.js';

const CANONICAL_REFERENCE = /^@([A-Za-z0-9_]+):([A-Za-z0-9_]+)$/;
// @SYS13342: upper-case prefix is the label file, the rest is the label id
const LEGACY_REFERENCE = /^@([A-Z]+)([0-9][A-Za-z0-9_]*)$/;

export interface ReferenceParseOptions {
  /** 接受旧式单段引用（规范格式优先匹配） */
  readonly allowLegacy?: boolean;
}

/**
 * 解析标签引用
 *
 * @param input 任意字符串，规范格式为 `@FileId:LabelId`
 * @returns 解析出的引用，或包含一条 InvalidReference 警告的诊断数组
 */
export function parseLabelReference(
  input: string,
  options: ReferenceParseOptions = {}
): LabelReference | Diagnostic[] {
  const canonical = CANONICAL_REFERENCE.exec(input);
  if (canonical?.[1] && canonical[2]) {
    return { fileId: canonical[1], labelId: canonical[2] };
  }

  if (options.allowLegacy) {
    const legacy = LEGACY_REFERENCE.exec(input);
    if (legacy?.[1] && legacy[2]) {
      return { fileId: legacy[1], labelId: legacy[2] };
    }
  }

  return [Diagnostics.invalidReference(input).build()];
}

export function formatLabelReference(reference: LabelReference): string {
  return `@${reference.fileId}:${reference.labelId}`;
}
