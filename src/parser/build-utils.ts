/**
 * 构建器共用的小工具：占位节点、文档附加、修饰符检查。
 */

import ts from 'typescript';
import { closeNode, Node } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Node as AstNode, DeclaredType, DocInfo, NameNode, Position } from '../types.js';
import type { BuilderContext } from './context.js';

export const MISSING_EXPRESSION = '__missing_expression__';
export const MISSING_NAME = '__missing_name__';

/** 报告不支持的语言特性，返回表达式占位名称 */
export function missingExpression(ctx: BuilderContext, node: ts.Node, feature: string): NameNode {
  ctx.report(Diagnostics.unsupportedFeature(feature, ctx.span(node)));
  return Node.name(MISSING_EXPRESSION, ctx.frameOf(node));
}

/** 报告不支持的语言特性，返回语句占位 Empty */
export function missingStatement(ctx: BuilderContext, node: ts.Node, feature: string): AstNode {
  ctx.report(Diagnostics.unsupportedFeature(feature, ctx.span(node)));
  return Node.plain('Empty', [], ctx.frameOf(node));
}

/** 合成的 Empty（源码中没有对应文本） */
export function syntheticEmpty(ctx: BuilderContext): AstNode {
  return Node.plain('Empty', [], ctx.frame(null));
}

export function emptyAt(ctx: BuilderContext, position: Position): AstNode {
  return Node.plain('Empty', [], ctx.frame(position));
}

export function withDoc<N extends AstNode>(node: N, doc: DocInfo | null): N {
  return doc === null ? node : closeNode(node, { docInfo: doc });
}

export function withMeta<N extends AstNode>(node: N, declaredType: DeclaredType | undefined, doc: DocInfo | null): N {
  if (declaredType === undefined && doc === null) return node;
  return closeNode(node, { declaredType, docInfo: doc ?? undefined });
}

const MODIFIER_FEATURES: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.PublicKeyword, 'accessibility modifiers'],
  [ts.SyntaxKind.PrivateKeyword, 'accessibility modifiers'],
  [ts.SyntaxKind.ProtectedKeyword, 'accessibility modifiers'],
  [ts.SyntaxKind.ReadonlyKeyword, 'readonly modifier'],
  [ts.SyntaxKind.AbstractKeyword, 'abstract modifier'],
  [ts.SyntaxKind.OverrideKeyword, 'override modifier'],
  [ts.SyntaxKind.DeclareKeyword, 'ambient declarations'],
  [ts.SyntaxKind.AccessorKeyword, 'auto-accessors'],
  [ts.SyntaxKind.ConstKeyword, 'const enums'],
  [ts.SyntaxKind.InKeyword, 'variance annotations'],
  [ts.SyntaxKind.OutKeyword, 'variance annotations'],
]);

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(modifier => modifier.kind === kind) ?? false;
}

/**
 * 检查修饰符与装饰器：allowed 之外的修饰符报告为不支持的特性。
 */
export function checkModifiers(ctx: BuilderContext, node: ts.Node, allowed: readonly ts.SyntaxKind[]): void {
  const decorators = ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined;
  for (const decorator of decorators ?? []) {
    ctx.report(Diagnostics.unsupportedFeature('decorators', ctx.span(decorator)));
  }
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  for (const modifier of modifiers ?? []) {
    if (allowed.includes(modifier.kind)) continue;
    const feature = MODIFIER_FEATURES.get(modifier.kind) ?? `${modifier.getText(ctx.root)} modifier`;
    ctx.report(Diagnostics.unsupportedFeature(feature, ctx.span(modifier)));
  }
}

/**
 * 去掉 `export` / `default` 修饰符与装饰器后的声明位置。
 * 导出声明的内层节点从声明关键字（或 async）开始。
 */
export function declarationPosition(ctx: BuilderContext, node: ts.Node): Position {
  let start = node.getStart(ctx.root);
  const decorators = ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined;
  for (const decorator of decorators ?? []) start = Math.max(start, ctx.skipTrivia(decorator.end));
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  for (const modifier of modifiers ?? []) {
    if (modifier.kind !== ts.SyntaxKind.ExportKeyword && modifier.kind !== ts.SyntaxKind.DefaultKeyword) break;
    start = ctx.skipTrivia(modifier.end);
  }
  return ctx.range(start, node.end);
}
