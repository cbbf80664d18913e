/**
 * CLI 输出工具：诊断与状态行写入 stderr，命令结果写入 stdout。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Red = '\u001B[31m',
  Green = '\u001B[32m',
  Yellow = '\u001B[33m',
  Dim = '\u001B[2m',
}

function useColor(): boolean {
  return Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined;
}

function paint(symbol: string, message: string, color: AnsiColor): string {
  return useColor() ? `${color}${symbol}${AnsiColor.Reset} ${message}` : `${symbol} ${message}`;
}

/** 命令的主输出（树、打印结果、JSON） */
export function output(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

export function success(message: string): void {
  console.error(paint('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.error(paint('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(paint('✗', message, AnsiColor.Red));
}

/** 源码摘录等附加说明 */
export function detail(message: string): void {
  console.error(useColor() ? `${AnsiColor.Dim}${message}${AnsiColor.Reset}` : message);
}
