/**
 * @module jsdoc-token-stream
 *
 * 文档注释词法器：把 `/**` 之后的注释正文切分为类型语法使用的扁平 Token 序列。
 *
 * **状态**：仅持有正文、起始偏移与一个游标；每次 `next()` 前移游标并返回一个 Token，
 * 不回溯、不可重启，重新扫描需要构造新的流。
 *
 * **规则**：
 * - 空格、制表符、换页符被跳过；`\n`、`\r\n`、`\r` 产生一个 EOL
 * - 行首（自上一个换行以来只有水平空白）的单个 `*` 是续行标记，被跳过
 * - `*\/` 产生 EOC，正文结束产生 EOF
 * - Token 起始处的 `...` 产生 ELLIPSIS，恰好消费三个点
 * - 字符串原子内的 `...` 仅在其后紧跟结构标点时才截断原子，否则并入原子
 *   （对尾随省略号的近似处理，保持原样）
 */

import { JsDocTokenKind, PUNCTUATION, isStructural, type JsDocToken } from './jsdoc-tokens.js';

function isHorizontalSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v' || ch === '\u00a0';
}

function isNewline(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

function isAnnotationStart(ch: string): boolean {
  return /^[A-Za-z]$/.test(ch);
}

function isAnnotationPart(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

export class JsDocTokenStream {
  private cursor = 0;

  constructor(
    private readonly body: string,
    private readonly startOffset: number
  ) {}

  next(): JsDocToken {
    for (;;) {
      const start = this.cursor;
      if (start >= this.body.length) {
        return this.token(JsDocTokenKind.EOF, null, this.body.length);
      }
      const ch = this.body.charAt(start);

      if (isHorizontalSpace(ch)) {
        this.cursor++;
        continue;
      }

      if (isNewline(ch)) {
        this.cursor += ch === '\r' && this.body.charAt(start + 1) === '\n' ? 2 : 1;
        return this.token(JsDocTokenKind.EOL, null, start);
      }

      if (ch === '*') {
        if (this.body.charAt(start + 1) === '/') {
          this.cursor += 2;
          return this.token(JsDocTokenKind.EOC, null, start);
        }
        this.cursor++;
        if (this.atLineStart(start)) continue;
        return this.token(JsDocTokenKind.STAR, null, start);
      }

      if (ch === '@' && isAnnotationStart(this.body.charAt(start + 1))) {
        let end = start + 2;
        while (end < this.body.length && isAnnotationPart(this.body.charAt(end))) end++;
        this.cursor = end;
        return this.token(JsDocTokenKind.ANNOTATION, this.body.slice(start + 1, end), start);
      }

      if (this.body.startsWith('...', start)) {
        this.cursor += 3;
        return this.token(JsDocTokenKind.ELLIPSIS, null, start);
      }

      const punct = PUNCTUATION.get(ch);
      if (punct !== undefined) {
        this.cursor++;
        return this.token(punct, null, start);
      }

      return this.readAtom(start);
    }
  }

  private readAtom(start: number): JsDocToken {
    let end = start;
    while (end < this.body.length) {
      const ch = this.body.charAt(end);
      if (isHorizontalSpace(ch) || isNewline(ch) || isStructural(ch)) break;
      if (ch === '.' && this.body.startsWith('...', end)) {
        const after = this.body.charAt(end + 3);
        if (after !== '' && isStructural(after)) break;
        end += 3;
        continue;
      }
      end++;
    }
    this.cursor = end;
    return this.token(JsDocTokenKind.STRING, this.body.slice(start, end), start);
  }

  private atLineStart(index: number): boolean {
    let i = index - 1;
    while (i >= 0 && isHorizontalSpace(this.body.charAt(i))) i--;
    return i >= 0 && isNewline(this.body.charAt(i));
  }

  private token(kind: JsDocTokenKind, text: string | null, index: number): JsDocToken {
    return { kind, text, offset: this.startOffset + index };
  }
}
