/**
 * @module expr-builder
 *
 * 表达式构建：把具体语法树的表达式节点转换为 AST 节点。
 *
 * - 括号不产生节点；带文档注释的括号表达式视为类型转换，文档附加到内层节点
 * - 二元运算链左结合，位置从左操作数起点到右操作数终点
 * - `-` 作用于数字字面量时折叠为一个负数 Number 节点
 */

import ts from 'typescript';
import { closeNode, Node, NodeDraft } from '../ast/ast.js';
import { DiagnosticBuilder, Diagnostics } from '../diagnostics/diagnostics.js';
import type { AssignKind, Node as AstNode, BinaryKind, DocInfo, IncDecKind, NameNode, Position } from '../types.js';
import { emptyAt, missingExpression, MISSING_NAME, withDoc } from './build-utils.js';
import type { BuilderContext } from './context.js';
import { buildClass, buildFunction, buildObjectLiteral } from './decl-builder.js';
import {
  ES3_KEYWORDS,
  ES5_RESERVED_KEYWORDS,
  ES5_STRICT_RESERVED_KEYWORDS,
  Es6Feature,
  EsNextFeature,
} from './es-features.js';
import { buildBigInt, buildRegExp, buildString, buildTemplateString, numberValue } from './literals.js';
import { buildAssignmentTarget, buildHole } from './pattern-builder.js';
import { spanBetween } from './position.js';
import { validateDeleteOperand, validateTarget, type TargetVerdict } from './target-validator.js';

const BINARY_OPERATORS: ReadonlyMap<ts.SyntaxKind, BinaryKind> = new Map<ts.SyntaxKind, BinaryKind>([
  [ts.SyntaxKind.BarBarToken, 'Or'],
  [ts.SyntaxKind.AmpersandAmpersandToken, 'And'],
  [ts.SyntaxKind.QuestionQuestionToken, 'Coalesce'],
  [ts.SyntaxKind.BarToken, 'BitOr'],
  [ts.SyntaxKind.CaretToken, 'BitXor'],
  [ts.SyntaxKind.AmpersandToken, 'BitAnd'],
  [ts.SyntaxKind.EqualsEqualsToken, 'Eq'],
  [ts.SyntaxKind.ExclamationEqualsToken, 'Ne'],
  [ts.SyntaxKind.EqualsEqualsEqualsToken, 'ShEq'],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, 'ShNe'],
  [ts.SyntaxKind.LessThanToken, 'Lt'],
  [ts.SyntaxKind.LessThanEqualsToken, 'Le'],
  [ts.SyntaxKind.GreaterThanToken, 'Gt'],
  [ts.SyntaxKind.GreaterThanEqualsToken, 'Ge'],
  [ts.SyntaxKind.InstanceOfKeyword, 'InstanceOf'],
  [ts.SyntaxKind.InKeyword, 'In'],
  [ts.SyntaxKind.LessThanLessThanToken, 'Lsh'],
  [ts.SyntaxKind.GreaterThanGreaterThanToken, 'Rsh'],
  [ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken, 'Ursh'],
  [ts.SyntaxKind.PlusToken, 'Add'],
  [ts.SyntaxKind.MinusToken, 'Sub'],
  [ts.SyntaxKind.AsteriskToken, 'Mul'],
  [ts.SyntaxKind.SlashToken, 'Div'],
  [ts.SyntaxKind.PercentToken, 'Mod'],
  [ts.SyntaxKind.AsteriskAsteriskToken, 'Exponent'],
  [ts.SyntaxKind.CommaToken, 'Comma'],
]);

const ASSIGN_OPERATORS: ReadonlyMap<ts.SyntaxKind, AssignKind> = new Map<ts.SyntaxKind, AssignKind>([
  [ts.SyntaxKind.EqualsToken, 'Assign'],
  [ts.SyntaxKind.BarEqualsToken, 'AssignBitOr'],
  [ts.SyntaxKind.CaretEqualsToken, 'AssignBitXor'],
  [ts.SyntaxKind.AmpersandEqualsToken, 'AssignBitAnd'],
  [ts.SyntaxKind.LessThanLessThanEqualsToken, 'AssignLsh'],
  [ts.SyntaxKind.GreaterThanGreaterThanEqualsToken, 'AssignRsh'],
  [ts.SyntaxKind.GreaterThanGreaterThanGreaterThanEqualsToken, 'AssignUrsh'],
  [ts.SyntaxKind.PlusEqualsToken, 'AssignAdd'],
  [ts.SyntaxKind.MinusEqualsToken, 'AssignSub'],
  [ts.SyntaxKind.AsteriskEqualsToken, 'AssignMul'],
  [ts.SyntaxKind.SlashEqualsToken, 'AssignDiv'],
  [ts.SyntaxKind.PercentEqualsToken, 'AssignMod'],
  [ts.SyntaxKind.AsteriskAsteriskEqualsToken, 'AssignExponent'],
  [ts.SyntaxKind.BarBarEqualsToken, 'AssignOr'],
  [ts.SyntaxKind.AmpersandAmpersandEqualsToken, 'AssignAnd'],
  [ts.SyntaxKind.QuestionQuestionEqualsToken, 'AssignCoalesce'],
]);

// ---------------------------------------------------------------------------
// 名称与属性键
// ---------------------------------------------------------------------------

/** 标识符文本；保留字报告错误，恢复产生的空标识符替换为占位名 */
export function identifierValue(ctx: BuilderContext, node: ts.Identifier): string {
  if (node.text === '') return MISSING_NAME;
  const reserved = ctx.isStrict() ? ES5_STRICT_RESERVED_KEYWORDS : ES5_RESERVED_KEYWORDS;
  if (reserved.has(node.text)) ctx.report(Diagnostics.reservedWord(ctx.span(node)));
  return node.text;
}

export function buildIdentifier(ctx: BuilderContext, node: ts.Identifier): NameNode {
  return Node.name(identifierValue(ctx, node), ctx.frameOf(node));
}

export interface PlainKey {
  readonly kind: 'plain';
  readonly value: string;
  readonly quoted: boolean;
  readonly numeric: boolean;
  readonly position: Position;
}

export interface ComputedKey {
  readonly kind: 'computed';
  readonly expression: AstNode;
}

export interface PrivateKey {
  readonly kind: 'private';
  readonly placeholder: AstNode;
}

export type PropertyKey = PlainKey | ComputedKey | PrivateKey;
export type PublicKey = PlainKey | ComputedKey;

export function identifierKey(ctx: BuilderContext, name: ts.Identifier): PlainKey {
  const position = ctx.span(name);
  if (ctx.config.mode === 'ES3' && ES3_KEYWORDS.has(name.text)) {
    ctx.report(Diagnostics.es3PropertyName(position));
  }
  return { kind: 'plain', value: name.text, quoted: false, numeric: false, position };
}

/**
 * 属性键：字符串与数字键都标记为 quoted，numeric 区分 `{1: x}` 与 `{'1': x}`。
 */
export function buildPropertyKey(ctx: BuilderContext, name: ts.PropertyName): PropertyKey {
  if (ts.isIdentifier(name)) return identifierKey(ctx, name);
  const position = ctx.span(name);
  if (ts.isStringLiteral(name) || ts.isNoSubstitutionTemplateLiteral(name)) {
    return { kind: 'plain', value: name.text, quoted: true, numeric: false, position };
  }
  if (ts.isNumericLiteral(name)) {
    return { kind: 'plain', value: String(numberValue(ctx, name, position)), quoted: true, numeric: true, position };
  }
  if (ts.isBigIntLiteral(name)) {
    ctx.esNext(EsNextFeature.bigint, name);
    return { kind: 'plain', value: name.text.slice(0, -1), quoted: true, numeric: true, position };
  }
  if (ts.isComputedPropertyName(name)) {
    ctx.es6(Es6Feature.computedProperty, name);
    return { kind: 'computed', expression: buildExpression(ctx, name.expression) };
  }
  return { kind: 'private', placeholder: missingExpression(ctx, name, 'private class members') };
}

// ---------------------------------------------------------------------------
// 表达式分派
// ---------------------------------------------------------------------------

/** 把校验结果记录为诊断 */
export function reportVerdict(ctx: BuilderContext, verdict: TargetVerdict, fallback: Position): void {
  if (verdict.ok) return;
  ctx.report(DiagnosticBuilder.error(verdict.code).withMessage(verdict.message).withPosition(verdict.position ?? fallback));
}

export function buildExpression(ctx: BuilderContext, node: ts.Expression): AstNode {
  ctx.trace('expression', node);
  const doc = ctx.claim(node);

  if (ts.isParenthesizedExpression(node)) {
    const inner = buildExpression(ctx, node.expression);
    if (doc === null) return inner;
    const cast = closeNode(inner, { docInfo: doc });
    ctx.casts.add(cast);
    return cast;
  }

  return withDoc(buildExpressionKind(ctx, node, doc), doc);
}

function buildExpressionKind(ctx: BuilderContext, node: ts.Expression, doc: DocInfo | null): AstNode {
  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return Node.plain('True', [], ctx.frameOf(node));
    case ts.SyntaxKind.FalseKeyword:
      return Node.plain('False', [], ctx.frameOf(node));
    case ts.SyntaxKind.NullKeyword:
      return Node.plain('Null', [], ctx.frameOf(node));
    case ts.SyntaxKind.ThisKeyword:
      return Node.plain('This', [], ctx.frameOf(node));
    case ts.SyntaxKind.SuperKeyword:
      ctx.es6(Es6Feature.superKeyword, node);
      return Node.plain('Super', [], ctx.frameOf(node));
    case ts.SyntaxKind.PrivateIdentifier:
      return missingExpression(ctx, node, 'private class members');
    default:
      break;
  }

  if (ts.isIdentifier(node)) return buildIdentifier(ctx, node);
  if (ts.isNumericLiteral(node)) {
    const position = ctx.span(node);
    return Node.number(numberValue(ctx, node, position), ctx.frame(position));
  }
  if (ts.isBigIntLiteral(node)) return buildBigInt(ctx, node);
  if (ts.isStringLiteral(node)) return buildString(ctx, node);
  if (ts.isRegularExpressionLiteral(node)) return buildRegExp(ctx, node);
  if (ts.isNoSubstitutionTemplateLiteral(node) || ts.isTemplateExpression(node)) {
    return buildTemplate(ctx, node, null, node);
  }
  if (ts.isTaggedTemplateExpression(node)) {
    if (node.typeArguments) return missingExpression(ctx, node, 'type arguments');
    return buildTemplate(ctx, node.template, node.tag, node);
  }

  if (ts.isArrayLiteralExpression(node)) return buildArrayLiteral(ctx, node);
  if (ts.isObjectLiteralExpression(node)) return buildObjectLiteral(ctx, node);
  if (ts.isFunctionExpression(node) || ts.isArrowFunction(node)) {
    return buildFunction(ctx, node, doc, { declaration: false });
  }
  if (ts.isClassExpression(node)) return buildClass(ctx, node, ctx.span(node));

  if (ts.isPropertyAccessExpression(node)) return buildPropertyAccess(ctx, node);
  if (ts.isElementAccessExpression(node)) {
    const object = buildExpression(ctx, node.expression);
    const element = buildExpression(ctx, node.argumentExpression);
    return Node.getElem(object, element, optionalLink(ctx, node), ctx.frameOf(node));
  }
  if (ts.isCallExpression(node)) return buildCall(ctx, node);
  if (ts.isNewExpression(node)) {
    if (node.typeArguments) return missingExpression(ctx, node, 'type arguments');
    const callee = buildExpression(ctx, node.expression);
    const args = (node.arguments ?? []).map(arg => buildExpression(ctx, arg));
    return Node.plain('New', [callee, ...args], ctx.frameOf(node));
  }
  if (ts.isSpreadElement(node)) {
    ctx.es6(Es6Feature.spread, node);
    return Node.plain('Spread', [buildExpression(ctx, node.expression)], ctx.frameOf(node));
  }

  if (ts.isPrefixUnaryExpression(node)) return buildPrefixUnary(ctx, node);
  if (ts.isPostfixUnaryExpression(node)) {
    const kind: IncDecKind = node.operator === ts.SyntaxKind.PlusPlusToken ? 'Inc' : 'Dec';
    return buildUpdate(ctx, node, kind, true);
  }
  if (ts.isDeleteExpression(node)) {
    const operand = buildExpression(ctx, node.expression);
    reportVerdict(ctx, validateDeleteOperand(operand, ctx.isStrict()), ctx.span(node.expression));
    return Node.unary('DelProp', operand, ctx.frameOf(node));
  }
  if (ts.isTypeOfExpression(node)) return Node.unary('Typeof', buildExpression(ctx, node.expression), ctx.frameOf(node));
  if (ts.isVoidExpression(node)) return Node.unary('Void', buildExpression(ctx, node.expression), ctx.frameOf(node));
  if (ts.isAwaitExpression(node)) return Node.unary('Await', buildExpression(ctx, node.expression), ctx.frameOf(node));
  if (ts.isYieldExpression(node)) {
    const operand = node.expression ? buildExpression(ctx, node.expression) : null;
    return Node.yield(operand, node.asteriskToken !== undefined, ctx.frameOf(node));
  }

  if (ts.isBinaryExpression(node)) return buildBinary(ctx, node);
  if (ts.isConditionalExpression(node)) {
    const condition = buildExpression(ctx, node.condition);
    const whenTrue = buildExpression(ctx, node.whenTrue);
    const whenFalse = buildExpression(ctx, node.whenFalse);
    return Node.plain('Hook', [condition, whenTrue, whenFalse], ctx.frameOf(node));
  }

  if (ts.isAsExpression(node)) return missingExpression(ctx, node, 'as expressions');
  if (ts.isSatisfiesExpression(node)) return missingExpression(ctx, node, 'satisfies expressions');
  if (ts.isNonNullExpression(node)) return missingExpression(ctx, node, 'non-null assertions');
  if (ts.isTypeAssertionExpression(node)) return missingExpression(ctx, node, 'type assertions');
  if (ts.isExpressionWithTypeArguments(node)) return missingExpression(ctx, node, 'instantiation expressions');
  if (ts.isMetaProperty(node)) {
    return missingExpression(ctx, node, node.keywordToken === ts.SyntaxKind.NewKeyword ? 'new.target' : 'import.meta');
  }
  if (ts.isJsxElement(node) || ts.isJsxSelfClosingElement(node) || ts.isJsxFragment(node)) {
    return missingExpression(ctx, node, 'JSX');
  }

  return missingExpression(ctx, node, ts.SyntaxKind[node.kind]);
}

// ---------------------------------------------------------------------------
// 各类表达式
// ---------------------------------------------------------------------------

function optionalLink(
  ctx: BuilderContext,
  node: ts.PropertyAccessExpression | ts.ElementAccessExpression | ts.CallExpression
): boolean {
  if (node.questionDotToken === undefined) return false;
  ctx.esNext(EsNextFeature.optionalChaining, node);
  return true;
}

function buildPropertyAccess(ctx: BuilderContext, node: ts.PropertyAccessExpression): AstNode {
  const object = buildExpression(ctx, node.expression);
  const name = node.name;
  if (ts.isPrivateIdentifier(name)) return missingExpression(ctx, name, 'private class members');
  const key = identifierKey(ctx, name);
  const property = Node.string(key.value, ctx.frame(key.position));
  return Node.getProp(object, property, optionalLink(ctx, node), ctx.frameOf(node));
}

function buildCall(ctx: BuilderContext, node: ts.CallExpression): AstNode {
  if (node.expression.kind === ts.SyntaxKind.ImportKeyword) return missingExpression(ctx, node, 'dynamic import');
  if (node.typeArguments) return missingExpression(ctx, node, 'type arguments');
  const callee = buildExpression(ctx, node.expression);
  const args = node.arguments.map(arg => buildExpression(ctx, arg));
  return Node.call(callee, args, optionalLink(ctx, node), ctx.frameOf(node));
}

function buildArrayLiteral(ctx: BuilderContext, node: ts.ArrayLiteralExpression): AstNode {
  const draft = new NodeDraft();
  for (const element of node.elements) {
    draft.add(ts.isOmittedExpression(element) ? buildHole(ctx, element) : buildExpression(ctx, element));
  }
  return draft.close(children => Node.plain('ArrayLit', children, ctx.frameOf(node)));
}

/**
 * 模板字面量：`TemplateLit(tag | Empty, TemplateString, (TemplateSub, TemplateString)*)`。
 * 无标签时 Empty 为模板起点处的零长度位置。
 */
function buildTemplate(
  ctx: BuilderContext,
  template: ts.TemplateLiteral,
  tag: ts.LeftHandSideExpression | null,
  whole: ts.Expression
): AstNode {
  ctx.es6(Es6Feature.templateLiterals, whole);
  const draft = new NodeDraft();
  if (tag !== null) {
    draft.add(buildExpression(ctx, tag));
  } else {
    const start = whole.getStart(ctx.root);
    draft.add(emptyAt(ctx, ctx.range(start, start)));
  }

  if (ts.isNoSubstitutionTemplateLiteral(template)) {
    draft.add(buildTemplateString(ctx, template));
  } else {
    draft.add(buildTemplateString(ctx, template.head));
    for (const span of template.templateSpans) {
      const substitution = buildExpression(ctx, span.expression);
      draft.add(Node.plain('TemplateSub', [substitution], ctx.frameOf(span.expression)));
      draft.add(buildTemplateString(ctx, span.literal));
    }
  }
  return draft.close(children => Node.plain('TemplateLit', children, ctx.frameOf(whole)));
}

function buildPrefixUnary(ctx: BuilderContext, node: ts.PrefixUnaryExpression): AstNode {
  switch (node.operator) {
    case ts.SyntaxKind.MinusToken: {
      if (ts.isNumericLiteral(node.operand)) {
        const position = ctx.span(node);
        return Node.number(-numberValue(ctx, node.operand, position), ctx.frame(position));
      }
      return Node.unary('Neg', buildExpression(ctx, node.operand), ctx.frameOf(node));
    }
    case ts.SyntaxKind.PlusToken:
      return Node.unary('Pos', buildExpression(ctx, node.operand), ctx.frameOf(node));
    case ts.SyntaxKind.TildeToken:
      return Node.unary('BitNot', buildExpression(ctx, node.operand), ctx.frameOf(node));
    case ts.SyntaxKind.ExclamationToken:
      return Node.unary('Not', buildExpression(ctx, node.operand), ctx.frameOf(node));
    case ts.SyntaxKind.PlusPlusToken:
      return buildUpdate(ctx, node, 'Inc', false);
    case ts.SyntaxKind.MinusMinusToken:
      return buildUpdate(ctx, node, 'Dec', false);
  }
}

function buildUpdate(
  ctx: BuilderContext,
  node: ts.PrefixUnaryExpression | ts.PostfixUnaryExpression,
  kind: IncDecKind,
  postfix: boolean
): AstNode {
  const operand = buildExpression(ctx, node.operand);
  const verdict = validateTarget(operand, kind === 'Inc' ? 'increment' : 'decrement');
  reportVerdict(ctx, verdict, ctx.span(node.operand));
  return Node.incDec(kind, operand, postfix, ctx.frameOf(node));
}

/** 左操作数起点到右操作数终点；括号不计入 */
function binaryPosition(ctx: BuilderContext, node: ts.BinaryExpression, left: AstNode, right: AstNode): Position {
  if (left.position === null || right.position === null) return ctx.span(node);
  return spanBetween(ctx.lineMap, left.position, right.position);
}

function buildBinary(ctx: BuilderContext, node: ts.BinaryExpression): AstNode {
  const operator = node.operatorToken.kind;
  const assign = ASSIGN_OPERATORS.get(operator);
  if (assign !== undefined) return buildAssign(ctx, node, assign);

  const kind = BINARY_OPERATORS.get(operator);
  if (kind === undefined) return missingExpression(ctx, node.operatorToken, ts.SyntaxKind[operator]);
  if (kind === 'Exponent') ctx.esNext(EsNextFeature.exponent, node);
  if (kind === 'Coalesce') ctx.esNext(EsNextFeature.nullishCoalescing, node);

  const left = buildExpression(ctx, node.left);
  const right = buildExpression(ctx, node.right);
  return Node.binary(kind, left, right, ctx.frame(binaryPosition(ctx, node, left, right)));
}

function buildAssign(ctx: BuilderContext, node: ts.BinaryExpression, kind: AssignKind): AstNode {
  if (kind === 'AssignOr' || kind === 'AssignAnd' || kind === 'AssignCoalesce') {
    ctx.esNext(EsNextFeature.logicalAssignment, node);
  }
  if (kind === 'AssignExponent') ctx.esNext(EsNextFeature.exponent, node);

  let target: AstNode;
  if (kind === 'Assign') {
    target = buildAssignmentTarget(ctx, node.left);
  } else {
    target = buildExpression(ctx, node.left);
    reportVerdict(ctx, validateTarget(target, 'compound-assign'), ctx.span(node.left));
  }
  const value = buildExpression(ctx, node.right);
  return Node.binary(kind, target, value, ctx.frame(binaryPosition(ctx, node, target, value)));
}
