/**
 * @module stmt-builder
 *
 * 语句与声明的构建。
 *
 * 文档注释由语句认领，表达式语句与带标签语句除外（它们的注释留给内部的首个结构）。
 */

import ts from 'typescript';
import { Node, NodeDraft } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Node as AstNode, DocInfo, Position } from '../types.js';
import {
  checkModifiers,
  declarationPosition,
  emptyAt,
  hasModifier,
  missingStatement,
  syntheticEmpty,
  withDoc,
  withMeta,
} from './build-utils.js';
import type { BuilderContext } from './context.js';
import { buildClass, buildFunction } from './decl-builder.js';
import { Es6Feature, EsNextFeature } from './es-features.js';
import { buildExpression, identifierValue } from './expr-builder.js';
import { buildExportAssignment, buildExportDeclaration, buildImport, exported } from './module-builder.js';
import { buildAssignmentPattern, buildAssignmentTarget, buildBindingName } from './pattern-builder.js';
import { inlineDeclaredType } from './type-syntax.js';

/** 指令序言：开头连续的字符串字面量表达式语句 */
export interface Prologue {
  /** 没有指令时为 null */
  readonly directives: ReadonlySet<string> | null;
  readonly body: readonly ts.Statement[];
}

export function splitPrologue(statements: readonly ts.Statement[]): Prologue {
  const directives = new Set<string>();
  let index = 0;
  for (; index < statements.length; index++) {
    const statement = statements[index];
    if (statement === undefined || !ts.isExpressionStatement(statement)) break;
    if (!ts.isStringLiteral(statement.expression)) break;
    directives.add(statement.expression.text);
  }
  return { directives: index === 0 ? null : directives, body: statements.slice(index) };
}

export function buildStatements(ctx: BuilderContext, statements: readonly ts.Statement[]): AstNode[] {
  return statements.map(statement => buildStatement(ctx, statement));
}

export function buildBlock(ctx: BuilderContext, block: ts.Block): AstNode {
  return Node.plain('Block', buildStatements(ctx, block.statements), ctx.frameOf(block));
}

/** 循环与分支的语句体总是 Block；单条语句包装为同位置的 Block */
function buildBody(ctx: BuilderContext, statement: ts.Statement): AstNode {
  if (ts.isBlock(statement)) return buildBlock(ctx, statement);
  if (ts.isEmptyStatement(statement)) return Node.plain('Block', [], ctx.frameOf(statement));
  return Node.plain('Block', [buildStatement(ctx, statement)], ctx.frameOf(statement));
}

export function buildStatement(ctx: BuilderContext, node: ts.Statement): AstNode {
  ctx.trace('statement', node);
  if (ts.isExpressionStatement(node)) {
    return Node.plain('ExprResult', [buildExpression(ctx, node.expression)], ctx.frameOf(node));
  }
  if (ts.isLabeledStatement(node)) {
    const label = Node.labelName(identifierValue(ctx, node.label), ctx.frameOf(node.label));
    return Node.plain('Label', [label, buildStatement(ctx, node.statement)], ctx.frameOf(node));
  }
  const doc = ctx.claim(node);
  if (ts.isFunctionDeclaration(node)) return buildFunctionDeclaration(ctx, node, doc);
  if (ts.isClassDeclaration(node)) return buildClassDeclaration(ctx, node, doc);
  if (ts.isVariableStatement(node)) return buildVariableStatement(ctx, node, doc);
  return withDoc(buildStatementKind(ctx, node), doc);
}

function buildStatementKind(ctx: BuilderContext, node: ts.Statement): AstNode {
  if (ts.isBlock(node)) return buildBlock(ctx, node);
  if (ts.isEmptyStatement(node)) return Node.plain('Empty', [], ctx.frameOf(node));
  if (ts.isIfStatement(node)) {
    const draft = new NodeDraft()
      .add(buildExpression(ctx, node.expression))
      .add(buildBody(ctx, node.thenStatement))
      .add(node.elseStatement ? buildBody(ctx, node.elseStatement) : null);
    return draft.close(children => Node.plain('If', children, ctx.frameOf(node)));
  }
  if (ts.isDoStatement(node)) {
    const body = buildBody(ctx, node.statement);
    return Node.plain('Do', [body, buildExpression(ctx, node.expression)], ctx.frameOf(node));
  }
  if (ts.isWhileStatement(node)) {
    const condition = buildExpression(ctx, node.expression);
    return Node.plain('While', [condition, buildBody(ctx, node.statement)], ctx.frameOf(node));
  }
  if (ts.isForStatement(node)) return buildFor(ctx, node);
  if (ts.isForInStatement(node)) return buildForIn(ctx, node);
  if (ts.isForOfStatement(node)) return buildForOf(ctx, node);
  if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
    const kind = ts.isBreakStatement(node) ? 'Break' : 'Continue';
    const label = node.label ? Node.labelName(identifierValue(ctx, node.label), ctx.frameOf(node.label)) : null;
    return Node.plain(kind, label ? [label] : [], ctx.frameOf(node));
  }
  if (ts.isReturnStatement(node)) {
    const value = node.expression ? [buildExpression(ctx, node.expression)] : [];
    return Node.plain('Return', value, ctx.frameOf(node));
  }
  if (ts.isThrowStatement(node)) {
    return Node.plain('Throw', [buildExpression(ctx, node.expression)], ctx.frameOf(node));
  }
  if (ts.isWithStatement(node)) {
    const object = buildExpression(ctx, node.expression);
    return Node.plain('With', [object, buildBody(ctx, node.statement)], ctx.frameOf(node));
  }
  if (ts.isDebuggerStatement(node)) return Node.plain('Debugger', [], ctx.frameOf(node));
  if (ts.isSwitchStatement(node)) return buildSwitch(ctx, node);
  if (ts.isTryStatement(node)) return buildTry(ctx, node);

  if (ts.isImportDeclaration(node)) return buildImport(ctx, node);
  if (ts.isExportDeclaration(node)) return buildExportDeclaration(ctx, node);
  if (ts.isExportAssignment(node)) return buildExportAssignment(ctx, node);

  if (ts.isInterfaceDeclaration(node)) return missingStatement(ctx, node, 'interfaces');
  if (ts.isTypeAliasDeclaration(node)) return missingStatement(ctx, node, 'type aliases');
  if (ts.isEnumDeclaration(node)) return missingStatement(ctx, node, 'enums');
  if (ts.isModuleDeclaration(node)) return missingStatement(ctx, node, 'namespaces');
  if (ts.isImportEqualsDeclaration(node)) return missingStatement(ctx, node, 'import assignments');
  return missingStatement(ctx, node, ts.SyntaxKind[node.kind]);
}

// ---------------------------------------------------------------------------
// 声明
// ---------------------------------------------------------------------------

function buildFunctionDeclaration(ctx: BuilderContext, node: ts.FunctionDeclaration, doc: DocInfo | null): AstNode {
  checkModifiers(ctx, node, [ts.SyntaxKind.ExportKeyword, ts.SyntaxKind.DefaultKeyword, ts.SyntaxKind.AsyncKeyword]);
  const position = declarationPosition(ctx, node);
  if (node.name === undefined && !hasModifier(node, ts.SyntaxKind.DefaultKeyword)) {
    ctx.report(Diagnostics.unnamedFunctionStatement(position));
  }
  const fn = buildFunction(ctx, node, doc, { declaration: true, position });
  return exported(ctx, node, withDoc(fn, doc));
}

function buildClassDeclaration(ctx: BuilderContext, node: ts.ClassDeclaration, doc: DocInfo | null): AstNode {
  checkModifiers(ctx, node, [ts.SyntaxKind.ExportKeyword, ts.SyntaxKind.DefaultKeyword]);
  const cls = buildClass(ctx, node, declarationPosition(ctx, node));
  return exported(ctx, node, withDoc(cls, doc));
}

function buildVariableStatement(ctx: BuilderContext, node: ts.VariableStatement, doc: DocInfo | null): AstNode {
  checkModifiers(ctx, node, [ts.SyntaxKind.ExportKeyword]);
  const list = buildDeclarationList(ctx, node.declarationList, doc, declarationPosition(ctx, node));
  return exported(ctx, node, withDoc(list, doc));
}

/**
 * `var` / `let` / `const` 声明列表。doc 为语句的文档注释，
 * 单个声明时其 `@type` 与内联类型互斥。
 */
export function buildDeclarationList(
  ctx: BuilderContext,
  list: ts.VariableDeclarationList,
  doc: DocInfo | null,
  position: Position
): AstNode {
  const scoped = list.flags & ts.NodeFlags.BlockScoped;
  let kind: 'Var' | 'Let' | 'Const';
  if (scoped === 0) kind = 'Var';
  else if (scoped === ts.NodeFlags.Let) {
    ctx.es6(Es6Feature.letDeclarations, list);
    kind = 'Let';
  } else if (scoped === ts.NodeFlags.Const) {
    ctx.es6(Es6Feature.constDeclarations, list);
    kind = 'Const';
  } else {
    return missingStatement(ctx, list, 'using declarations');
  }

  const statementType = list.declarations.length === 1 ? (doc?.type ?? null) : null;
  const draft = new NodeDraft();
  for (const declaration of list.declarations) draft.add(buildDeclarator(ctx, declaration, statementType));
  return draft.close(children => Node.plain(kind, children, ctx.frame(position)));
}

function buildDeclarator(
  ctx: BuilderContext,
  declaration: ts.VariableDeclaration,
  statementType: DocInfo['type']
): AstNode {
  if (declaration.exclamationToken) {
    ctx.report(Diagnostics.unsupportedFeature('definite assignment assertions', ctx.span(declaration)));
  }
  const init = declaration.initializer ? buildExpression(ctx, declaration.initializer) : null;

  if (!ts.isIdentifier(declaration.name)) {
    if (declaration.type) {
      ctx.report(Diagnostics.unsupportedFeature('destructuring type annotation', ctx.span(declaration.type)));
    }
    const pattern = buildBindingName(ctx, declaration.name);
    return Node.plain('DestructuringLhs', init ? [pattern, init] : [pattern], ctx.frameOf(declaration));
  }

  const inlineDoc = ctx.claimInline(declaration.name);
  const declaredType = inlineDeclaredType(ctx, declaration.type, inlineDoc?.type ?? statementType);
  const name = Node.name(identifierValue(ctx, declaration.name), ctx.frameOf(declaration.name), init ? [init] : []);
  return withMeta(name, declaredType, inlineDoc);
}

// ---------------------------------------------------------------------------
// 循环
// ---------------------------------------------------------------------------

function buildFor(ctx: BuilderContext, node: ts.ForStatement): AstNode {
  let init = syntheticEmpty(ctx);
  if (node.initializer !== undefined) {
    init = ts.isVariableDeclarationList(node.initializer)
      ? buildDeclarationList(ctx, node.initializer, null, ctx.span(node.initializer))
      : buildExpression(ctx, node.initializer);
  }
  const condition = node.condition ? buildExpression(ctx, node.condition) : syntheticEmpty(ctx);
  const increment = node.incrementor ? buildExpression(ctx, node.incrementor) : syntheticEmpty(ctx);
  const body = buildBody(ctx, node.statement);
  return Node.plain('For', [init, condition, increment, body], ctx.frameOf(node));
}

/**
 * for-in / for-of 的左侧。数组、对象字面量在 ES6 之前不能作为解构目标。
 */
function loopTarget(ctx: BuilderContext, initializer: ts.ForInitializer, loop: 'in' | 'of'): AstNode {
  if (ts.isVariableDeclarationList(initializer)) {
    return buildDeclarationList(ctx, initializer, null, ctx.span(initializer));
  }
  if (ts.isArrayLiteralExpression(initializer) || ts.isObjectLiteralExpression(initializer)) {
    if (ctx.config.mode === 'ES3' || ctx.config.mode === 'ES5') {
      const position = ctx.span(initializer);
      ctx.report(loop === 'in' ? Diagnostics.invalidForInTarget(position) : Diagnostics.invalidForOfTarget(position));
      return buildExpression(ctx, initializer);
    }
    return buildAssignmentPattern(ctx, initializer);
  }
  return buildAssignmentTarget(ctx, initializer);
}

function buildForIn(ctx: BuilderContext, node: ts.ForInStatement): AstNode {
  const target = loopTarget(ctx, node.initializer, 'in');
  const object = buildExpression(ctx, node.expression);
  return Node.plain('ForIn', [target, object, buildBody(ctx, node.statement)], ctx.frameOf(node));
}

function buildForOf(ctx: BuilderContext, node: ts.ForOfStatement): AstNode {
  ctx.es6(Es6Feature.forOf, node);
  if (node.awaitModifier) ctx.esNext(EsNextFeature.forAwaitOf, node);
  const target = loopTarget(ctx, node.initializer, 'of');
  const iterable = buildExpression(ctx, node.expression);
  const kind = node.awaitModifier ? 'ForAwaitOf' : 'ForOf';
  return Node.plain(kind, [target, iterable, buildBody(ctx, node.statement)], ctx.frameOf(node));
}

// ---------------------------------------------------------------------------
// switch / try
// ---------------------------------------------------------------------------

/** case 子句的语句块：首条语句到末条语句；为空时是 `:` 之后的零长度位置 */
function clauseBlock(ctx: BuilderContext, clause: ts.CaseOrDefaultClause, colon: number): AstNode {
  const statements = clause.statements;
  const first = statements[0];
  const last = statements[statements.length - 1];
  const position =
    first && last ? ctx.range(first.getStart(ctx.root), last.end) : ctx.range(colon + 1, colon + 1);
  return Node.plain('Block', buildStatements(ctx, statements), ctx.frame(position));
}

function buildSwitch(ctx: BuilderContext, node: ts.SwitchStatement): AstNode {
  const draft = new NodeDraft().add(buildExpression(ctx, node.expression));
  for (const clause of node.caseBlock.clauses) {
    const start = clause.getStart(ctx.root);
    if (ts.isCaseClause(clause)) {
      const test = buildExpression(ctx, clause.expression);
      const block = clauseBlock(ctx, clause, ctx.skipTrivia(clause.expression.end));
      draft.add(Node.plain('Case', [test, block], ctx.frame(ctx.range(start, clause.expression.end))));
    } else {
      const keywordEnd = start + 'default'.length;
      const block = clauseBlock(ctx, clause, ctx.skipTrivia(keywordEnd));
      draft.add(Node.plain('DefaultCase', [block], ctx.frame(ctx.range(start, keywordEnd))));
    }
  }
  return draft.close(children => Node.plain('Switch', children, ctx.frameOf(node)));
}

function buildCatch(ctx: BuilderContext, clause: ts.CatchClause): AstNode {
  let binding = syntheticEmpty(ctx);
  const declaration = clause.variableDeclaration;
  if (declaration === undefined) {
    ctx.esNext(EsNextFeature.optionalCatchBinding, clause);
  } else {
    binding = buildBindingName(ctx, declaration.name);
    if (ts.isIdentifier(declaration.name)) {
      const inlineDoc = ctx.claimInline(declaration.name);
      const declaredType = inlineDeclaredType(ctx, declaration.type, inlineDoc?.type);
      binding = withMeta(binding, declaredType, inlineDoc);
    } else if (declaration.type) {
      ctx.report(Diagnostics.unsupportedFeature('destructuring type annotation', ctx.span(declaration.type)));
    }
  }
  return Node.plain('Catch', [binding, buildBlock(ctx, clause.block)], ctx.frameOf(clause));
}

/** 缺省的 catch / finally 是前一个块末尾的零长度 Empty */
function buildTry(ctx: BuilderContext, node: ts.TryStatement): AstNode {
  const tryBlock = buildBlock(ctx, node.tryBlock);
  let previousEnd = node.tryBlock.end;
  let handler: AstNode;
  if (node.catchClause) {
    handler = buildCatch(ctx, node.catchClause);
    previousEnd = node.catchClause.block.end;
  } else {
    handler = emptyAt(ctx, ctx.range(previousEnd, previousEnd));
  }
  const finalizer = node.finallyBlock
    ? buildBlock(ctx, node.finallyBlock)
    : emptyAt(ctx, ctx.range(previousEnd, previousEnd));
  return Node.plain('Try', [tryBlock, handler, finalizer], ctx.frameOf(node));
}
