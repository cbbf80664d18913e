/**
 * @module pattern-builder
 *
 * 解构模式的构建。
 *
 * 两种来源产生同一套节点（ArrayPattern / ObjectPattern / DefaultValue / Rest）：
 * - 绑定位置（声明、参数、catch）上的 BindingPattern
 * - 赋值左侧被重新解释为模式的数组、对象字面量
 */

import ts from 'typescript';
import { Node, NodeDraft } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Node as AstNode } from '../types.js';
import { emptyAt, MISSING_EXPRESSION } from './build-utils.js';
import type { BuilderContext } from './context.js';
import { Es6Feature, EsNextFeature } from './es-features.js';
import {
  buildExpression,
  buildIdentifier,
  buildPropertyKey,
  identifierKey,
  type PublicKey,
} from './expr-builder.js';
import { validateTarget } from './target-validator.js';

/** 数组空位：长度为 1，位于标记空位的逗号或括号处 */
export function buildHole(ctx: BuilderContext, element: ts.OmittedExpression): AstNode {
  const at = ctx.skipTrivia(element.pos);
  return emptyAt(ctx, ctx.range(at, at + 1));
}

function keyed(ctx: BuilderContext, key: PublicKey, value: AstNode, node: ts.Node): AstNode {
  if (key.kind === 'computed') return Node.computedProp('value', false, key.expression, value, ctx.frameOf(node));
  return Node.stringKey(key.value, key, [value], ctx.frame(key.position));
}

// ---------------------------------------------------------------------------
// 绑定模式
// ---------------------------------------------------------------------------

export function buildBindingName(ctx: BuilderContext, name: ts.BindingName): AstNode {
  if (ts.isIdentifier(name)) return buildIdentifier(ctx, name);
  ctx.es6(Es6Feature.destructuring, name);
  if (ts.isArrayBindingPattern(name)) {
    const draft = new NodeDraft();
    for (const element of name.elements) {
      draft.add(ts.isOmittedExpression(element) ? buildHole(ctx, element) : buildBindingElement(ctx, element));
    }
    return draft.close(children => Node.plain('ArrayPattern', children, ctx.frameOf(name)));
  }
  const draft = new NodeDraft();
  for (const element of name.elements) draft.add(buildObjectBindingElement(ctx, element));
  return draft.close(children => Node.plain('ObjectPattern', children, ctx.frameOf(name)));
}

/** 绑定目标加上默认值 */
function bindingTarget(ctx: BuilderContext, element: ts.BindingElement): AstNode {
  const target = buildBindingName(ctx, element.name);
  if (element.initializer === undefined) return target;
  const value = buildExpression(ctx, element.initializer);
  const position = ctx.range(element.name.getStart(ctx.root), element.end);
  return Node.plain('DefaultValue', [target, value], ctx.frame(position));
}

function buildBindingElement(ctx: BuilderContext, element: ts.BindingElement): AstNode {
  if (element.dotDotDotToken) {
    return Node.plain('Rest', [buildBindingName(ctx, element.name)], ctx.frameOf(element));
  }
  return bindingTarget(ctx, element);
}

function buildObjectBindingElement(ctx: BuilderContext, element: ts.BindingElement): AstNode {
  if (element.dotDotDotToken) {
    ctx.esNext(EsNextFeature.objectRest, element);
    return Node.plain('Rest', [buildBindingName(ctx, element.name)], ctx.frameOf(element));
  }
  const keyNode = element.propertyName ?? element.name;
  if (ts.isObjectBindingPattern(keyNode) || ts.isArrayBindingPattern(keyNode)) return bindingTarget(ctx, element);
  const key = buildPropertyKey(ctx, keyNode);
  if (key.kind === 'private') return key.placeholder;
  return keyed(ctx, key, bindingTarget(ctx, element), element);
}

// ---------------------------------------------------------------------------
// 赋值模式
// ---------------------------------------------------------------------------

/**
 * 赋值左侧：数组、对象字面量转为模式，其余表达式必须是可赋值的引用。
 */
export function buildAssignmentTarget(ctx: BuilderContext, node: ts.Expression): AstNode {
  if (ts.isArrayLiteralExpression(node) || ts.isObjectLiteralExpression(node)) {
    return buildAssignmentPattern(ctx, node);
  }
  const target = buildExpression(ctx, node);
  const verdict = validateTarget(target, 'assign');
  if (!verdict.ok) ctx.report(Diagnostics.invalidAssignmentTarget(verdict.position ?? ctx.span(node)));
  return target;
}

export function buildAssignmentPattern(
  ctx: BuilderContext,
  node: ts.ArrayLiteralExpression | ts.ObjectLiteralExpression
): AstNode {
  ctx.es6(Es6Feature.destructuring, node);
  const draft = new NodeDraft();
  if (ts.isArrayLiteralExpression(node)) {
    for (const element of node.elements) {
      if (ts.isOmittedExpression(element)) draft.add(buildHole(ctx, element));
      else if (ts.isSpreadElement(element)) {
        draft.add(Node.plain('Rest', [buildAssignmentTarget(ctx, element.expression)], ctx.frameOf(element)));
      } else draft.add(assignmentElement(ctx, element));
    }
    return draft.close(children => Node.plain('ArrayPattern', children, ctx.frameOf(node)));
  }

  for (const property of node.properties) draft.add(assignmentProperty(ctx, property));
  return draft.close(children => Node.plain('ObjectPattern', children, ctx.frameOf(node)));
}

/** `target = default` 形式的元素 */
function assignmentElement(ctx: BuilderContext, element: ts.Expression): AstNode {
  if (ts.isBinaryExpression(element) && element.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
    const target = buildAssignmentTarget(ctx, element.left);
    const value = buildExpression(ctx, element.right);
    return Node.plain('DefaultValue', [target, value], ctx.frameOf(element));
  }
  return buildAssignmentTarget(ctx, element);
}

function assignmentProperty(ctx: BuilderContext, property: ts.ObjectLiteralElementLike): AstNode {
  if (ts.isSpreadAssignment(property)) {
    ctx.esNext(EsNextFeature.objectRest, property);
    return Node.plain('Rest', [buildAssignmentTarget(ctx, property.expression)], ctx.frameOf(property));
  }

  if (ts.isShorthandPropertyAssignment(property)) {
    const key = identifierKey(ctx, property.name);
    let target: AstNode = buildIdentifier(ctx, property.name);
    if (property.objectAssignmentInitializer) {
      const value = buildExpression(ctx, property.objectAssignmentInitializer);
      target = Node.plain('DefaultValue', [target, value], ctx.frameOf(property));
    }
    return keyed(ctx, key, target, property);
  }

  if (ts.isPropertyAssignment(property)) {
    const key = buildPropertyKey(ctx, property.name);
    if (key.kind === 'private') return key.placeholder;
    return keyed(ctx, key, assignmentElement(ctx, property.initializer), property);
  }

  // 方法与访问器不能出现在赋值模式中
  ctx.report(Diagnostics.invalidAssignmentTarget(ctx.span(property)));
  return Node.name(MISSING_EXPRESSION, ctx.frameOf(property));
}
