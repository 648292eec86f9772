/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 * 结果数据走 stdout（console.log），提示信息按级别分流。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.log(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.log(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

/** 输出 `名称: 值` 形式的结果行，值为空时显示占位符 */
export function field(name: string, value: string | null | undefined, width = 14): void {
  console.log(`${`${name}:`.padEnd(width)}${value ?? '—'}`);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
