/**
 * 标签解析相关的共享类型
 */

/** 回退语言，请求语言的标签文件不存在时使用 */
export const FALLBACK_LANGUAGE = 'en-US';

/** `@FileId:LabelId` 解析结果 */
export interface LabelReference {
  readonly fileId: string;
  readonly labelId: string;
}

export interface LabelEntry {
  readonly labelId: string;
  readonly text: string;
  /** 仅当 `;` 行紧跟在标签行之后时存在 */
  readonly description?: string;
}

/** 单个已定位标签文件的全部条目，构建后不可变 */
export type LabelTable = ReadonlyMap<string, LabelEntry>;

export type LabelFileLoad =
  | { readonly ok: true; readonly table: LabelTable }
  | { readonly ok: false; readonly error: Error };

export type LabelLookupStatus =
  | 'found'
  | 'invalid-reference'
  | 'file-not-found'
  | 'label-not-found'
  | 'read-failed';

export interface LabelLookup {
  readonly reference: string;
  readonly found: boolean;
  readonly status: LabelLookupStatus;
  readonly text: string | null;
  readonly description: string | null;
  /** 调用方请求的语言 */
  readonly language: string;
  /** 实际命中文件的语言；未找到文件时为 null */
  readonly resolvedLanguage: string | null;
  readonly fallbackApplied: boolean;
  readonly filePath: string | null;
}

export interface LabelBatchResult {
  readonly language: string;
  /** reference → text，只包含找到的标签 */
  readonly found: ReadonlyMap<string, string>;
  readonly requestedCount: number;
  readonly foundCount: number;
}
