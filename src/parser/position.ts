import type { Position } from '../types.js';

/**
 * 行起始偏移表：把绝对字符偏移换算为 (line, column)。
 *
 * 行终止符与 ECMAScript 一致：`\n`、`\r\n`、`\r`、`\u2028`、`\u2029`。
 */
export class LineMap {
  private readonly starts: readonly number[];

  constructor(readonly text: string) {
    this.starts = buildLineStarts(text);
  }

  get lineCount(): number {
    return this.starts.length;
  }

  /** 偏移所在行（1 起）与列（0 起） */
  lineAndColumn(offset: number): { line: number; column: number } {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= clamped) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: clamped - (this.starts[lo] ?? 0) };
  }

  /** 由起止偏移构造位置；反向区间长度取 0 */
  positionOf(start: number, end: number): Position {
    const { line, column } = this.lineAndColumn(start);
    return { line, column, length: Math.max(0, end - start), offset: start };
  }

  /** 行首偏移（行号 1 起），超出范围返回 -1 */
  lineStart(line: number): number {
    return this.starts[line - 1] ?? -1;
  }
}

function buildLineStarts(text: string): number[] {
  const starts: number[] = [0];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x0d) {
      if (text.charCodeAt(i + 1) === 0x0a) i++;
      starts.push(i + 1);
    } else if (ch === 0x0a || ch === 0x2028 || ch === 0x2029) {
      starts.push(i + 1);
    }
  }
  return starts;
}

export function endOffset(pos: Position): number {
  return pos.offset + pos.length;
}

/** 从 first 起点到 last 终点的跨度（二元运算链、逗号链） */
export function spanBetween(lineMap: LineMap, first: Position, last: Position): Position {
  return lineMap.positionOf(first.offset, endOffset(last));
}

/** 紧随 pos 之后的零长度位置（占位节点） */
export function positionAfter(lineMap: LineMap, pos: Position): Position {
  const end = endOffset(pos);
  return lineMap.positionOf(end, end);
}

export function isLineTerminator(ch: number): boolean {
  return ch === 0x0a || ch === 0x0d || ch === 0x2028 || ch === 0x2029;
}

function isWhitespace(ch: number): boolean {
  return (
    ch === 0x20 ||
    ch === 0x09 ||
    ch === 0x0b ||
    ch === 0x0c ||
    ch === 0xa0 ||
    ch === 0xfeff ||
    isLineTerminator(ch) ||
    (ch >= 0x2000 && ch <= 0x200a) ||
    ch === 0x1680 ||
    ch === 0x202f ||
    ch === 0x205f ||
    ch === 0x3000
  );
}

/**
 * 跳过空白与注释，返回首个有效字符的偏移。
 * 未闭合的块注释视为延伸到文本末尾。
 */
export function skipTrivia(text: string, offset: number): number {
  let i = offset;
  while (i < text.length) {
    const ch = text.charCodeAt(i);
    if (isWhitespace(ch)) {
      i++;
      continue;
    }
    if (ch === 0x2f /* / */) {
      const next = text.charCodeAt(i + 1);
      if (next === 0x2f) {
        i += 2;
        while (i < text.length && !isLineTerminator(text.charCodeAt(i))) i++;
        continue;
      }
      if (next === 0x2a) {
        const close = text.indexOf('*/', i + 2);
        i = close === -1 ? text.length : close + 2;
        continue;
      }
    }
    break;
  }
  return i;
}
