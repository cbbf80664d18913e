/**
 * @module module-builder
 *
 * ES 模块：import / export 声明与带 `export` 修饰符的声明。
 *
 * - `Import(default | Empty, ImportSpecs | ImportStar | Empty, String)`
 * - `Export(ExportSpecs[, String])`、`Export(String)`（`export *`）、`Export(decl)`
 */

import ts from 'typescript';
import { Node, NodeDraft } from '../ast/ast.js';
import type { Node as AstNode } from '../types.js';
import { hasModifier, missingExpression, missingStatement, syntheticEmpty } from './build-utils.js';
import type { BuilderContext } from './context.js';
import { Es6Feature } from './es-features.js';
import { buildExpression, buildIdentifier } from './expr-builder.js';
import { buildString } from './literals.js';

/** 导出名与导入名可以是字符串字面量（`export { a as "b-c" }`） */
function moduleExportName(ctx: BuilderContext, name: ts.Identifier | ts.StringLiteral): AstNode {
  return Node.name(name.text, ctx.frameOf(name));
}

function moduleSpecifier(ctx: BuilderContext, specifier: ts.Expression): AstNode {
  if (ts.isStringLiteral(specifier)) return buildString(ctx, specifier);
  return missingExpression(ctx, specifier, 'non-literal module specifiers');
}

/** 带 `export` 修饰符的声明包装为 Export；内层声明保留自己的位置与文档 */
export function exported(ctx: BuilderContext, node: ts.Node, inner: AstNode): AstNode {
  if (!hasModifier(node, ts.SyntaxKind.ExportKeyword)) return inner;
  ctx.es6(Es6Feature.modules, node);
  const isDefault = hasModifier(node, ts.SyntaxKind.DefaultKeyword);
  return Node.export([inner], { isDefault, exportAll: false }, ctx.frameOf(node));
}

export function buildImport(ctx: BuilderContext, node: ts.ImportDeclaration): AstNode {
  ctx.es6(Es6Feature.modules, node);
  const clause = node.importClause;
  if (clause?.isTypeOnly) return missingStatement(ctx, node, 'type-only imports');
  if (node.attributes) return missingStatement(ctx, node, 'import attributes');

  const defaultBinding = clause?.name ? buildIdentifier(ctx, clause.name) : syntheticEmpty(ctx);
  let bindings = syntheticEmpty(ctx);
  const named = clause?.namedBindings;
  if (named !== undefined && ts.isNamespaceImport(named)) {
    bindings = Node.plain('ImportStar', [buildIdentifier(ctx, named.name)], ctx.frameOf(named));
  } else if (named !== undefined) {
    const draft = new NodeDraft();
    for (const element of named.elements) {
      if (element.isTypeOnly) {
        draft.add(missingExpression(ctx, element, 'type-only imports'));
        continue;
      }
      const imported = moduleExportName(ctx, element.propertyName ?? element.name);
      const local = buildIdentifier(ctx, element.name);
      draft.add(Node.plain('ImportSpec', [imported, local], ctx.frameOf(element)));
    }
    bindings = draft.close(children => Node.plain('ImportSpecs', children, ctx.frameOf(named)));
  }

  const source = moduleSpecifier(ctx, node.moduleSpecifier);
  return Node.plain('Import', [defaultBinding, bindings, source], ctx.frameOf(node));
}

export function buildExportDeclaration(ctx: BuilderContext, node: ts.ExportDeclaration): AstNode {
  ctx.es6(Es6Feature.modules, node);
  if (node.isTypeOnly) return missingStatement(ctx, node, 'type-only exports');
  if (node.attributes) return missingStatement(ctx, node, 'import attributes');

  const source = node.moduleSpecifier ? moduleSpecifier(ctx, node.moduleSpecifier) : null;
  const clause = node.exportClause;
  if (clause === undefined) {
    const children = source ? [source] : [];
    return Node.export(children, { isDefault: false, exportAll: true }, ctx.frameOf(node));
  }
  if (ts.isNamespaceExport(clause)) return missingStatement(ctx, node, 'export * as ns');

  const draft = new NodeDraft();
  for (const element of clause.elements) {
    if (element.isTypeOnly) {
      draft.add(missingExpression(ctx, element, 'type-only exports'));
      continue;
    }
    const local = moduleExportName(ctx, element.propertyName ?? element.name);
    const exportedName = moduleExportName(ctx, element.name);
    draft.add(Node.plain('ExportSpec', [local, exportedName], ctx.frameOf(element)));
  }
  const specs = draft.close(children => Node.plain('ExportSpecs', children, ctx.frameOf(clause)));
  return Node.export(source ? [specs, source] : [specs], { isDefault: false, exportAll: false }, ctx.frameOf(node));
}

/** `export default expr`；`export =` 不支持 */
export function buildExportAssignment(ctx: BuilderContext, node: ts.ExportAssignment): AstNode {
  if (node.isExportEquals) return missingStatement(ctx, node, 'export =');
  ctx.es6(Es6Feature.modules, node);
  const value = buildExpression(ctx, node.expression);
  return Node.export([value], { isDefault: true, exportAll: false }, ctx.frameOf(node));
}
