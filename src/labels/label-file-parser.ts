/**
 * 标签资源文件解析器
 *
 * 文件格式（逐行）：
 * ```
 * LabelId:标签文本
 * ;可选说明，必须紧跟在标签行之后
 * ```
 * 空行与无法识别的行都会切断说明与上一条标签的关联。
 */

import { readFile } from 'node:fs/promises';
import type { LabelEntry, LabelTable } from './types.js';

const LABEL_LINE = /^([A-Za-z0-9_]+):(.*)$/s;
const DESCRIPTION_LINE = /^;(.*)$/s;
const BYTE_ORDER_MARK = '\uFEFF';

interface MutableEntry {
  labelId: string;
  text: string;
  description?: string;
}

/**
 * 将标签文件内容解析为标签表
 *
 * 同一 labelId 出现多次时以最后一次为准。
 */
export function parseLabelFileContent(content: string): LabelTable {
  const source = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  const entries = new Map<string, MutableEntry>();
  let current: MutableEntry | null = null;

  for (const line of source.split(/\r\n|\n|\r/)) {
    if (line.trim() === '') {
      current = null;
      continue;
    }

    const label = LABEL_LINE.exec(line);
    if (label?.[1] !== undefined && label[2] !== undefined) {
      current = { labelId: label[1], text: label[2] };
      entries.set(current.labelId, current);
      continue;
    }

    const description = DESCRIPTION_LINE.exec(line);
    if (description?.[1] !== undefined && current) {
      current.description = description[1];
      continue;
    }

    current = null;
  }

  return freezeTable(entries);
}

/**
 * 读取并解析标签文件（UTF-8）
 *
 * 读取失败时抛出原始 I/O 错误，由调用方决定如何处理。
 */
export async function readLabelFile(filePath: string): Promise<LabelTable> {
  const content = await readFile(filePath, 'utf-8');
  return parseLabelFileContent(content);
}

function freezeTable(entries: ReadonlyMap<string, MutableEntry>): LabelTable {
  const table = new Map<string, LabelEntry>();
  for (const [labelId, entry] of entries) {
    const frozen: LabelEntry =
      entry.description === undefined
        ? { labelId, text: entry.text }
        : { labelId, text: entry.text, description: entry.description };
    table.set(labelId, Object.freeze(frozen));
  }
  return table;
}
