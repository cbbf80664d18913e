/**
 * @module jsdoc-type-parser
 *
 * 文档注释类型语法解析器（Closure 风格）。
 *
 * 在 JsDocTokenStream 之上自行维护一个 Token 的前瞻；Token 流本身没有前瞻能力。
 * 语法错误以 DiagnosticError 抛出，由注释解析器捕获后降级为警告。
 *
 * ```
 * TopLevel   := Type ('|' Type)*
 * Type       := '?' Type? | '!' Basic | '...' Type? | Basic Postfix*
 * Postfix    := '?' | '!' | '=' | '[' ']'
 * Basic      := '*' | '(' TopLevel ')' | '{' Field (',' Field)* '}'
 *             | 'function' '(' Params ')' (':' Type)? | Name TypeArgs?
 * TypeArgs   := '.'? '<' Type (',' Type)* '>'
 * ```
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { LineMap } from '../parser/position.js';
import type {
  FunctionTypeParam,
  Position,
  RecordField,
  TypeExpression,
} from '../types.js';
import type { JsDocTokenStream } from './jsdoc-token-stream.js';
import { JsDocTokenKind, type JsDocToken } from './jsdoc-tokens.js';

export const TypeSyntaxDetail = {
  syntax: 'type not recognized due to syntax error',
  closingCurly: 'expected closing }',
  closingAngle: 'missing closing >',
  openingParen: 'missing opening (',
  closingParen: 'missing closing )',
  closingSquare: 'missing closing ]',
  colon: 'expecting colon after this',
  varArgsLast: 'variable length argument must be last',
  typeName: 'expecting a type name',
  paramName: 'expecting a variable name in a @param tag',
} as const;

function tokenLength(token: JsDocToken): number {
  switch (token.kind) {
    case JsDocTokenKind.ANNOTATION:
      return (token.text ?? '').length + 1;
    case JsDocTokenKind.STRING:
      return (token.text ?? '').length;
    case JsDocTokenKind.ELLIPSIS:
      return 3;
    case JsDocTokenKind.EOC:
      return 2;
    case JsDocTokenKind.EOF:
      return 0;
    default:
      return 1;
  }
}

/**
 * 单 Token 前瞻游标。
 */
export class JsDocCursor {
  private current: JsDocToken;
  private lastEnd: number;

  constructor(
    private readonly stream: JsDocTokenStream,
    readonly lineMap: LineMap
  ) {
    this.current = stream.next();
    this.lastEnd = this.current.offset;
  }

  peek(): JsDocToken {
    return this.current;
  }

  advance(): JsDocToken {
    const consumed = this.current;
    this.lastEnd = consumed.offset + tokenLength(consumed);
    if (consumed.kind !== JsDocTokenKind.EOF && consumed.kind !== JsDocTokenKind.EOC) {
      this.current = this.stream.next();
    }
    return consumed;
  }

  is(kind: JsDocTokenKind): boolean {
    return this.current.kind === kind;
  }

  eat(kind: JsDocTokenKind): boolean {
    if (this.current.kind !== kind) return false;
    this.advance();
    return true;
  }

  skipEols(): void {
    while (this.current.kind === JsDocTokenKind.EOL) this.advance();
  }

  /** 注释是否已结束（EOC 或 EOF） */
  atEnd(): boolean {
    return this.current.kind === JsDocTokenKind.EOC || this.current.kind === JsDocTokenKind.EOF;
  }

  /** 从 start 到最近消费的 Token 末尾 */
  spanFrom(start: number): Position {
    return this.lineMap.positionOf(start, Math.max(start, this.lastEnd));
  }

  positionOf(token: JsDocToken): Position {
    return this.lineMap.positionOf(token.offset, token.offset + tokenLength(token));
  }

  fail(detail: string, token: JsDocToken = this.current): never {
    return Diagnostics.badTypeAnnotation(detail, this.positionOf(token)).throw();
  }
}

/** 能够开始一个类型表达式的 Token */
function startsType(token: JsDocToken): boolean {
  switch (token.kind) {
    case JsDocTokenKind.STRING:
    case JsDocTokenKind.STAR:
    case JsDocTokenKind.LEFT_PAREN:
    case JsDocTokenKind.LEFT_CURLY:
    case JsDocTokenKind.QMARK:
    case JsDocTokenKind.BANG:
    case JsDocTokenKind.ELLIPSIS:
      return true;
    default:
      return false;
  }
}

export class JsDocTypeParser {
  constructor(private readonly cursor: JsDocCursor) {}

  /** 顶层类型：允许不加括号的联合 */
  parseTopLevel(): TypeExpression {
    const start = this.cursor.peek().offset;
    const first = this.parseType();
    if (!this.cursor.is(JsDocTokenKind.PIPE)) return first;
    const alternatives: TypeExpression[] = [first];
    while (this.eatInType(JsDocTokenKind.PIPE)) {
      alternatives.push(this.parseType());
    }
    return { kind: 'UnionType', alternatives, position: this.cursor.spanFrom(start) };
  }

  /** 花括号包围的类型，`{` 尚未消费 */
  parseBracedType(): TypeExpression {
    this.cursor.advance();
    this.cursor.skipEols();
    const type = this.parseTopLevel();
    this.cursor.skipEols();
    if (!this.cursor.eat(JsDocTokenKind.RIGHT_CURLY)) {
      this.cursor.fail(TypeSyntaxDetail.closingCurly);
    }
    return type;
  }

  parseType(): TypeExpression {
    this.cursor.skipEols();
    const token = this.cursor.peek();
    const start = token.offset;

    if (token.kind === JsDocTokenKind.QMARK) {
      this.cursor.advance();
      if (!startsType(this.cursor.peek()) || this.cursor.is(JsDocTokenKind.QMARK)) {
        const unknown: TypeExpression = { kind: 'UnknownType', position: this.cursor.spanFrom(start) };
        return this.cursor.eat(JsDocTokenKind.EQUALS)
          ? { kind: 'OptionalType', type: unknown, position: this.cursor.spanFrom(start) }
          : unknown;
      }
      const type = this.parseType();
      return { kind: 'NullableType', type, position: this.cursor.spanFrom(start) };
    }

    if (token.kind === JsDocTokenKind.BANG) {
      this.cursor.advance();
      const type = this.parseBasic();
      return { kind: 'NonNullableType', type, position: this.cursor.spanFrom(start) };
    }

    if (token.kind === JsDocTokenKind.ELLIPSIS) {
      this.cursor.advance();
      const type = startsType(this.cursor.peek()) ? this.parseType() : null;
      return { kind: 'RestType', type, position: this.cursor.spanFrom(start) };
    }

    let type = this.parseBasic();
    for (;;) {
      if (this.cursor.eat(JsDocTokenKind.QMARK)) {
        type = { kind: 'NullableType', type, position: this.cursor.spanFrom(start) };
      } else if (this.cursor.eat(JsDocTokenKind.BANG)) {
        type = { kind: 'NonNullableType', type, position: this.cursor.spanFrom(start) };
      } else if (this.cursor.eat(JsDocTokenKind.EQUALS)) {
        type = { kind: 'OptionalType', type, position: this.cursor.spanFrom(start) };
      } else if (this.cursor.is(JsDocTokenKind.LEFT_SQUARE)) {
        this.cursor.advance();
        if (!this.cursor.eat(JsDocTokenKind.RIGHT_SQUARE)) {
          this.cursor.fail(TypeSyntaxDetail.closingSquare);
        }
        type = { kind: 'ArrayType', element: type, position: this.cursor.spanFrom(start) };
      } else {
        return type;
      }
    }
  }

  private parseBasic(): TypeExpression {
    this.cursor.skipEols();
    const token = this.cursor.peek();
    const start = token.offset;

    switch (token.kind) {
      case JsDocTokenKind.STAR:
        this.cursor.advance();
        return { kind: 'AnyType', position: this.cursor.spanFrom(start) };
      case JsDocTokenKind.LEFT_PAREN: {
        this.cursor.advance();
        const inner = this.parseTopLevel();
        this.cursor.skipEols();
        if (!this.cursor.eat(JsDocTokenKind.RIGHT_PAREN)) {
          this.cursor.fail(TypeSyntaxDetail.closingParen);
        }
        return inner;
      }
      case JsDocTokenKind.LEFT_CURLY:
        return this.parseRecord();
      case JsDocTokenKind.STRING:
        if (token.text === 'function') return this.parseFunction();
        return this.parseNamed();
      default:
        return this.cursor.fail(TypeSyntaxDetail.syntax);
    }
  }

  private parseNamed(): TypeExpression {
    const token = this.cursor.advance();
    const start = token.offset;
    let name = token.text ?? '';

    if (name === 'void') return { kind: 'VoidType', position: this.cursor.spanFrom(start) };

    const typeArguments: TypeExpression[] = [];
    if (this.cursor.is(JsDocTokenKind.LEFT_ANGLE)) {
      // Array.<string> 的点号被原子吸收，这里去掉
      if (name.endsWith('.')) name = name.slice(0, -1);
      this.cursor.advance();
      typeArguments.push(this.parseTopLevel());
      while (this.eatInType(JsDocTokenKind.COMMA)) {
        typeArguments.push(this.parseTopLevel());
      }
      this.cursor.skipEols();
      if (!this.cursor.eat(JsDocTokenKind.RIGHT_ANGLE)) {
        this.cursor.fail(TypeSyntaxDetail.closingAngle);
      }
    }
    return { kind: 'NamedType', name, typeArguments, position: this.cursor.spanFrom(start) };
  }

  private parseRecord(): TypeExpression {
    const start = this.cursor.advance().offset;
    const fields: RecordField[] = [];
    this.cursor.skipEols();
    if (!this.cursor.is(JsDocTokenKind.RIGHT_CURLY)) {
      do {
        this.cursor.skipEols();
        const key = this.cursor.peek();
        if (key.kind !== JsDocTokenKind.STRING || key.text === null) {
          return this.cursor.fail(TypeSyntaxDetail.syntax);
        }
        this.cursor.advance();
        let type: TypeExpression | null = null;
        if (this.cursor.eat(JsDocTokenKind.COLON)) {
          type = this.parseTopLevel();
        }
        fields.push({ name: key.text, type, optional: type?.kind === 'OptionalType' });
      } while (this.eatInType(JsDocTokenKind.COMMA));
    }
    this.cursor.skipEols();
    if (!this.cursor.eat(JsDocTokenKind.RIGHT_CURLY)) {
      this.cursor.fail(TypeSyntaxDetail.closingCurly);
    }
    return { kind: 'RecordType', fields, position: this.cursor.spanFrom(start) };
  }

  private parseFunction(): TypeExpression {
    const start = this.cursor.advance().offset;
    if (!this.cursor.eat(JsDocTokenKind.LEFT_PAREN)) {
      this.cursor.fail(TypeSyntaxDetail.openingParen);
    }

    let thisType: TypeExpression | null = null;
    let newType: TypeExpression | null = null;
    const params: FunctionTypeParam[] = [];
    let sawRest = false;

    this.cursor.skipEols();
    if (!this.cursor.is(JsDocTokenKind.RIGHT_PAREN)) {
      do {
        this.cursor.skipEols();
        const token = this.cursor.peek();
        if (sawRest) this.cursor.fail(TypeSyntaxDetail.varArgsLast, token);

        if (
          params.length === 0 &&
          thisType === null &&
          newType === null &&
          token.kind === JsDocTokenKind.STRING &&
          (token.text === 'this' || token.text === 'new')
        ) {
          this.cursor.advance();
          if (!this.cursor.eat(JsDocTokenKind.COLON)) {
            this.cursor.fail(TypeSyntaxDetail.colon, token);
          }
          if (!startsType(this.cursor.peek())) this.cursor.fail(TypeSyntaxDetail.typeName);
          const bound = this.parseType();
          if (token.text === 'this') thisType = bound;
          else newType = bound;
          continue;
        }

        const type = this.parseType();
        if (type.kind === 'RestType') sawRest = true;
        params.push({ name: null, type });
      } while (this.eatInType(JsDocTokenKind.COMMA));
    }

    this.cursor.skipEols();
    if (!this.cursor.eat(JsDocTokenKind.RIGHT_PAREN)) {
      this.cursor.fail(TypeSyntaxDetail.closingParen);
    }

    let returnType: TypeExpression | null = null;
    if (this.cursor.eat(JsDocTokenKind.COLON)) {
      returnType = this.parseType();
    }
    return {
      kind: 'FunctionType',
      params,
      returnType,
      thisType,
      newType,
      position: this.cursor.spanFrom(start),
    };
  }

  /** 类型内部允许换行：跳过换行后尝试消费 */
  private eatInType(kind: JsDocTokenKind): boolean {
    this.cursor.skipEols();
    return this.cursor.eat(kind);
  }
}
