/**
 * @module jsdoc-tokens
 *
 * 文档注释类型语法的 Token 种类。
 */

export enum JsDocTokenKind {
  ANNOTATION = 'ANNOTATION',
  LEFT_CURLY = 'LEFT_CURLY',
  RIGHT_CURLY = 'RIGHT_CURLY',
  LEFT_ANGLE = 'LEFT_ANGLE',
  RIGHT_ANGLE = 'RIGHT_ANGLE',
  LEFT_PAREN = 'LEFT_PAREN',
  RIGHT_PAREN = 'RIGHT_PAREN',
  LEFT_SQUARE = 'LEFT_SQUARE',
  RIGHT_SQUARE = 'RIGHT_SQUARE',
  PIPE = 'PIPE',
  BANG = 'BANG',
  QMARK = 'QMARK',
  EQUALS = 'EQUALS',
  COLON = 'COLON',
  COMMA = 'COMMA',
  ELLIPSIS = 'ELLIPSIS',
  STAR = 'STAR',
  STRING = 'STRING',
  EOL = 'EOL',
  EOC = 'EOC',
  EOF = 'EOF',
}

export interface JsDocToken {
  readonly kind: JsDocTokenKind;
  /** ANNOTATION 为标签名（不含 `@`），STRING 为原子文本，其余为 null */
  readonly text: string | null;
  /** 源码中的绝对偏移 */
  readonly offset: number;
}

/** 单字符结构标点到 Token 种类的映射（`*` 单独处理） */
export const PUNCTUATION: ReadonlyMap<string, JsDocTokenKind> = new Map([
  ['{', JsDocTokenKind.LEFT_CURLY],
  ['}', JsDocTokenKind.RIGHT_CURLY],
  ['<', JsDocTokenKind.LEFT_ANGLE],
  ['>', JsDocTokenKind.RIGHT_ANGLE],
  ['(', JsDocTokenKind.LEFT_PAREN],
  [')', JsDocTokenKind.RIGHT_PAREN],
  ['[', JsDocTokenKind.LEFT_SQUARE],
  [']', JsDocTokenKind.RIGHT_SQUARE],
  ['|', JsDocTokenKind.PIPE],
  ['!', JsDocTokenKind.BANG],
  ['?', JsDocTokenKind.QMARK],
  ['=', JsDocTokenKind.EQUALS],
  [':', JsDocTokenKind.COLON],
  [',', JsDocTokenKind.COMMA],
]);

export function isStructural(ch: string): boolean {
  return ch === '*' || PUNCTUATION.has(ch);
}
