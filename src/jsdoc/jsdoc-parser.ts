/**
 * @module jsdoc-parser
 *
 * 文档注释解析：把一条 `/** ... *\/` 注释解析为 DocInfo。
 *
 * - 每个 ANNOTATION Token 都产生一个标记（`@` 所在的行列），不论标签是否被识别
 * - 带类型的标签按 Closure 类型语法解析，语法问题降级为 `Bad type annotation.` 警告
 * - 标签解析失败后跳到下一个标签继续
 */

import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import type { DiagnosticsCollector } from '../diagnostics/collector.js';
import type { LineMap } from '../parser/position.js';
import type {
  Comment,
  DocFlags,
  DocInfo,
  DocMarker,
  DocParam,
  TypeExpression,
  Visibility,
} from '../types.js';
import { JsDocTokenStream } from './jsdoc-token-stream.js';
import { JsDocTokenKind, type JsDocToken } from './jsdoc-tokens.js';
import { JsDocCursor, JsDocTypeParser, TypeSyntaxDetail } from './jsdoc-type-parser.js';

export interface JsDocParseContext {
  readonly lineMap: LineMap;
  readonly diagnostics: DiagnosticsCollector;
}

type FlagName = keyof DocFlags;

const FLAG_TAGS: ReadonlyMap<string, FlagName> = new Map([
  ['constructor', 'isConstructor'],
  ['interface', 'interface'],
  ['record', 'record'],
  ['const', 'const'],
  ['define', 'define'],
  ['deprecated', 'deprecated'],
  ['override', 'override'],
  ['nosideeffects', 'noSideEffects'],
  ['final', 'final'],
  ['export', 'export'],
  ['fileoverview', 'fileOverview'],
  ['overview', 'fileOverview'],
]);

const VISIBILITY_TAGS: ReadonlyMap<string, Visibility> = new Map([
  ['public', 'public'],
  ['protected', 'protected'],
  ['private', 'private'],
  ['package', 'package'],
]);

const ANNOTATION_PATTERN = /(\/|(\n[ \t]*))\*[ \t]*@[a-zA-Z]+[ \t\n{]/;

/** 普通块注释中出现形似标签的内容（多半是少写了一个 `*`） */
export function hasSuspiciousAnnotation(text: string): boolean {
  return !text.startsWith('/**') && ANNOTATION_PATTERN.test(text);
}

/** 注释正文中是否含有标签 */
export function hasAnnotations(text: string): boolean {
  return /(^|[\s*])@[A-Za-z]/.test(text.slice(3));
}

/** 是否带有文件级标签（@fileoverview、@license、@preserve） */
export function isFileLevelDoc(doc: DocInfo): boolean {
  return doc.flags.fileOverview || doc.license !== null;
}

function cleanLines(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map(line => line.replace(/^\s*\*(?!\/)\s?/, '').trimEnd())
    .join('\n')
    .trim();
}

function stripDelimiters(raw: string): string {
  const body = raw.startsWith('/**') ? raw.slice(3) : raw;
  return body.endsWith('*/') ? body.slice(0, -2) : body;
}

function descriptionOf(raw: string): string | null {
  const body = stripDelimiters(raw);
  const tag = /(^|[\s*])@[A-Za-z]/.exec(body);
  const text = cleanLines(tag ? body.slice(0, tag.index + tag[1].length) : body);
  return text === '' ? null : text;
}

interface DocDraft {
  markers: DocMarker[];
  type: TypeExpression | null;
  returnType: TypeExpression | null;
  thisType: TypeExpression | null;
  enumType: TypeExpression | null;
  typedefType: TypeExpression | null;
  baseType: TypeExpression | null;
  implementedTypes: TypeExpression[];
  params: DocParam[];
  templateNames: string[];
  suppressions: string[];
  visibility: Visibility | null;
  license: string | null;
  flags: { -readonly [K in FlagName]: boolean };
}

function emptyDraft(): DocDraft {
  return {
    markers: [],
    type: null,
    returnType: null,
    thisType: null,
    enumType: null,
    typedefType: null,
    baseType: null,
    implementedTypes: [],
    params: [],
    templateNames: [],
    suppressions: [],
    visibility: null,
    license: null,
    flags: {
      isConstructor: false,
      interface: false,
      record: false,
      const: false,
      define: false,
      deprecated: false,
      override: false,
      noSideEffects: false,
      final: false,
      export: false,
      fileOverview: false,
    },
  };
}

function freeze(raw: string, inline: boolean, draft: DocDraft): DocInfo {
  return Object.freeze({
    raw,
    description: inline ? null : descriptionOf(raw),
    markers: draft.markers,
    inline,
    type: draft.type,
    returnType: draft.returnType,
    thisType: draft.thisType,
    enumType: draft.enumType,
    typedefType: draft.typedefType,
    baseType: draft.baseType,
    implementedTypes: draft.implementedTypes,
    params: draft.params,
    templateNames: draft.templateNames,
    suppressions: draft.suppressions,
    visibility: draft.visibility,
    license: draft.license,
    flags: Object.freeze({ ...draft.flags }),
  });
}

function openCursor(comment: Comment, ctx: JsDocParseContext): JsDocCursor {
  const stream = new JsDocTokenStream(comment.text.slice(3), comment.position.offset + 3);
  return new JsDocCursor(stream, ctx.lineMap);
}

function reportTypeError(error: unknown, ctx: JsDocParseContext): void {
  if (!(error instanceof DiagnosticError)) throw error;
  ctx.diagnostics.report({ ...error.diagnostic, sourceName: ctx.diagnostics.sourceName });
}

class TagParser {
  private readonly types: JsDocTypeParser;

  constructor(
    private readonly cursor: JsDocCursor,
    private readonly draft: DocDraft,
    private readonly comment: Comment,
    private readonly ctx: JsDocParseContext
  ) {
    this.types = new JsDocTypeParser(cursor);
  }

  parse(annotation: JsDocToken): void {
    const tag = annotation.text ?? '';
    const flag = FLAG_TAGS.get(tag);
    if (flag !== undefined) this.draft.flags[flag] = true;

    const visibility = VISIBILITY_TAGS.get(tag);
    if (visibility !== undefined) {
      this.draft.visibility = visibility;
      this.typeSlot('type', annotation, this.bracedType());
      return;
    }

    switch (tag) {
      case 'type':
        this.typeSlot('type', annotation, this.requiredType());
        return;
      case 'return':
      case 'returns':
        this.typeSlot('return', annotation, this.bracedType());
        return;
      case 'const':
      case 'define':
        this.typeSlot('type', annotation, this.bracedType());
        return;
      case 'this':
        this.draft.thisType = this.requiredType();
        return;
      case 'enum':
        this.draft.enumType = this.bracedType() ?? { kind: 'NamedType', name: 'number', typeArguments: [], position: null };
        return;
      case 'typedef':
        this.draft.typedefType = this.requiredType();
        return;
      case 'extends':
      case 'augments':
        this.draft.baseType = this.requiredType();
        return;
      case 'implements':
        this.draft.implementedTypes.push(this.requiredType());
        return;
      case 'param':
        this.parseParam();
        return;
      case 'template':
        this.draft.templateNames.push(...this.wordsOnLine());
        return;
      case 'suppress':
        this.parseSuppress();
        return;
      case 'license':
      case 'preserve':
        this.draft.license = this.restOfComment(annotation);
        return;
      default:
        return;
    }
  }

  private typeSlot(slot: 'type' | 'return', annotation: JsDocToken, type: TypeExpression | null): void {
    if (type === null) return;
    const current = slot === 'type' ? this.draft.type : this.draft.returnType;
    if (current !== null) {
      this.ctx.diagnostics.emit(Diagnostics.extraTag(slot, this.cursor.positionOf(annotation)));
      return;
    }
    if (slot === 'type') this.draft.type = type;
    else this.draft.returnType = type;
  }

  private bracedType(): TypeExpression | null {
    return this.cursor.is(JsDocTokenKind.LEFT_CURLY) ? this.types.parseBracedType() : null;
  }

  /** `{T}` 或同一行上不带括号的类型 */
  private requiredType(): TypeExpression {
    if (this.cursor.is(JsDocTokenKind.LEFT_CURLY)) return this.types.parseBracedType();
    if (this.cursor.is(JsDocTokenKind.EOL) || this.cursor.atEnd()) {
      return this.cursor.fail(TypeSyntaxDetail.typeName);
    }
    return this.types.parseType();
  }

  private parseParam(): void {
    let type = this.bracedType();
    const token = this.cursor.peek();

    if (token.kind === JsDocTokenKind.STRING && token.text !== null) {
      this.cursor.advance();
      this.draft.params.push({ name: token.text, type });
      return;
    }

    if (token.kind === JsDocTokenKind.LEFT_SQUARE) {
      this.cursor.advance();
      const name = this.cursor.peek();
      if (name.kind !== JsDocTokenKind.STRING || name.text === null) {
        return this.cursor.fail(TypeSyntaxDetail.paramName, name);
      }
      this.cursor.advance();
      // [name=default]：跳过默认值直到 `]`
      while (!this.cursor.is(JsDocTokenKind.RIGHT_SQUARE)) {
        if (this.cursor.is(JsDocTokenKind.EOL) || this.cursor.atEnd()) {
          this.cursor.fail(TypeSyntaxDetail.closingSquare);
        }
        this.cursor.advance();
      }
      this.cursor.advance();
      if (type !== null && type.kind !== 'OptionalType') {
        type = { kind: 'OptionalType', type, position: type.position };
      }
      this.draft.params.push({ name: name.text, type });
      return;
    }

    this.cursor.fail(TypeSyntaxDetail.paramName, token);
  }

  private wordsOnLine(): string[] {
    const words: string[] = [];
    for (;;) {
      const token = this.cursor.peek();
      if (token.kind === JsDocTokenKind.STRING && token.text !== null) {
        words.push(token.text);
        this.cursor.advance();
      } else if (token.kind === JsDocTokenKind.COMMA) {
        this.cursor.advance();
      } else {
        return words;
      }
    }
  }

  private parseSuppress(): void {
    if (!this.cursor.eat(JsDocTokenKind.LEFT_CURLY)) return;
    for (;;) {
      const token = this.cursor.peek();
      if (token.kind === JsDocTokenKind.RIGHT_CURLY) {
        this.cursor.advance();
        return;
      }
      if (token.kind === JsDocTokenKind.STRING && token.text !== null) {
        this.draft.suppressions.push(token.text);
        this.cursor.advance();
      } else if (token.kind === JsDocTokenKind.PIPE || token.kind === JsDocTokenKind.COMMA) {
        this.cursor.advance();
      } else {
        this.cursor.fail(TypeSyntaxDetail.closingCurly, token);
      }
    }
  }

  private restOfComment(annotation: JsDocToken): string {
    const from = annotation.offset + (annotation.text ?? '').length + 1 - this.comment.position.offset;
    return cleanLines(stripDelimiters(this.comment.text.slice(0, 3) + this.comment.text.slice(from)));
  }
}

/**
 * 解析一条文档注释。标签解析中的语法问题作为警告记录到 ctx.diagnostics。
 */
export function parseJsDocComment(comment: Comment, ctx: JsDocParseContext): DocInfo {
  const cursor = openCursor(comment, ctx);
  const draft = emptyDraft();
  const tags = new TagParser(cursor, draft, comment, ctx);

  while (!cursor.atEnd()) {
    const token = cursor.advance();
    if (token.kind !== JsDocTokenKind.ANNOTATION) continue;

    const { line, column } = ctx.lineMap.lineAndColumn(token.offset);
    draft.markers.push({ annotation: token.text ?? '', line, column });
    try {
      tags.parse(token);
    } catch (error) {
      reportTypeError(error, ctx);
    }
  }

  return freeze(comment.text, false, draft);
}

/**
 * 解析 `/** T *\/` 形式的内联类型注释。整段正文必须是单个类型表达式；
 * 无法解析时记录警告，返回的 DocInfo 不带类型。
 */
export function parseInlineTypeDoc(comment: Comment, ctx: JsDocParseContext): DocInfo {
  const cursor = openCursor(comment, ctx);
  const draft = emptyDraft();
  try {
    const type = new JsDocTypeParser(cursor).parseTopLevel();
    cursor.skipEols();
    if (!cursor.atEnd()) cursor.fail(TypeSyntaxDetail.syntax);
    draft.type = type;
  } catch (error) {
    reportTypeError(error, ctx);
  }
  return freeze(comment.text, true, draft);
}
