/**
 * @module literals
 *
 * 字面量：数字（含进制与旧式八进制）、字符串（续行、八进制转义）、正则、BigInt。
 */

import ts from 'typescript';
import { Node } from '../ast/ast.js';
import { supportsEs6, supportsEsNext } from '../config/language-config.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Node as AstNode, Position } from '../types.js';
import type { BuilderContext } from './context.js';
import { EsNextFeature, REGEXP_FLAGS } from './es-features.js';

const LEGACY_OCTAL = /^0[0-7]+$/;
const LEGACY_DECIMAL = /^0[0-9]*[89][0-9]*$/;
const LINE_CONTINUATION = /\\(\r\n|\r|\n|\u2028|\u2029)/;
const OCTAL_ESCAPE = /\\(?:[1-7]|0[0-9])/;

/** 去掉转义反斜杠后判断，避免把 `\\1` 当作八进制转义 */
function hasOctalEscape(raw: string): boolean {
  return OCTAL_ESCAPE.test(raw.replace(/\\\\/g, ''));
}

function hasLineContinuation(raw: string): boolean {
  return LINE_CONTINUATION.test(raw.replace(/\\\\/g, ''));
}

/**
 * 数值字面量。value 由源码文本计算，position 由调用者给出（负数折叠时从 `-` 开始）。
 */
export function numberValue(ctx: BuilderContext, node: ts.NumericLiteral, position: Position): number {
  const source = node.getText(ctx.root);
  const lower = source.toLowerCase();

  if (source.includes('_')) {
    if (!supportsEsNext(ctx.config.mode)) {
      ctx.report(Diagnostics.esNextFeature(EsNextFeature.numericSeparators, position));
    }
  }

  if (lower.startsWith('0b')) {
    if (!supportsEs6(ctx.config.mode)) ctx.report(Diagnostics.binaryLiteral(position));
  } else if (lower.startsWith('0o')) {
    if (!supportsEs6(ctx.config.mode)) ctx.report(Diagnostics.octalLiteral(position));
  } else if (LEGACY_OCTAL.test(source)) {
    if (ctx.isStrict()) ctx.report(Diagnostics.strictOctalLiteral(position));
    return parseInt(source.slice(1), 8);
  } else if (LEGACY_DECIMAL.test(source)) {
    return parseInt(source, 10);
  }

  const value = Number(node.text);
  if (Number.isNaN(value)) {
    ctx.report(Diagnostics.invalidNumberLiteral(position));
    return 0;
  }
  return value;
}

export function buildBigInt(ctx: BuilderContext, node: ts.BigIntLiteral): AstNode {
  ctx.esNext(EsNextFeature.bigint, node);
  const digits = node.text.slice(0, -1).replace(/_/g, '');
  let value: bigint;
  try {
    value = BigInt(digits);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    ctx.report(Diagnostics.invalidNumberLiteral(ctx.span(node)));
    value = 0n;
  }
  return Node.bigint(value, ctx.frameOf(node));
}

/** 字符串字面量：值取 TypeScript 计算的转义后文本 */
export function buildString(ctx: BuilderContext, node: ts.StringLiteral): AstNode {
  const raw = node.getText(ctx.root);
  const position = ctx.span(node);
  if (hasLineContinuation(raw)) {
    if (ctx.config.mode === 'ES3') ctx.report(Diagnostics.stringContinuationError(position));
    else ctx.report(Diagnostics.stringContinuationWarning(position));
  }
  if (ctx.isStrict() && hasOctalEscape(raw)) {
    ctx.report(Diagnostics.octalEscape(position));
  }
  return Node.string(node.text, ctx.frame(position));
}

/**
 * 正则字面量：value 保留源码原文（含分隔符与标志）。
 */
export function buildRegExp(ctx: BuilderContext, node: ts.RegularExpressionLiteral): AstNode {
  const value = node.text;
  const slash = value.lastIndexOf('/');
  const pattern = value.slice(1, slash);
  const flags = value.slice(slash + 1);
  const position = ctx.span(node);

  for (const flag of flags) {
    if (REGEXP_FLAGS.es5.has(flag)) continue;
    if (REGEXP_FLAGS.es6.has(flag)) {
      if (!supportsEs6(ctx.config.mode)) {
        ctx.report(Diagnostics.es6Feature(`new RegExp flag '${flag}'`, position));
      }
      continue;
    }
    if (REGEXP_FLAGS.esNext.has(flag)) {
      if (!supportsEsNext(ctx.config.mode)) {
        ctx.report(Diagnostics.esNextFeature(`RegExp flag '${flag}'`, position));
      }
      continue;
    }
    ctx.report(Diagnostics.invalidRegExpFlag(flag, position));
  }

  return Node.regexp(value, pattern, flags, ctx.frame(position));
}

/** 模板片段的原始文本（去掉反引号与 `${` / `}` 定界符） */
function templateRaw(ctx: BuilderContext, node: ts.TemplateLiteralLikeNode): string {
  if (node.rawText !== undefined) return node.rawText;
  const text = node.getText(ctx.root);
  const head = text.startsWith('`') || text.startsWith('}') ? 1 : 0;
  const tail = text.endsWith('${') ? 2 : text.endsWith('`') ? 1 : 0;
  return text.slice(head, text.length - tail);
}

export function buildTemplateString(ctx: BuilderContext, node: ts.TemplateLiteralLikeNode): AstNode {
  return Node.templateString(node.text, templateRaw(ctx, node), ctx.frameOf(node));
}

