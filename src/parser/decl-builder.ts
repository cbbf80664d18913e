/**
 * @module decl-builder
 *
 * 函数、类与对象字面量的构建。
 *
 * 函数节点固定为 `Function(Name, ParamList, body)`：
 * - 匿名函数与成员函数的名称为空字符串的合成 Name
 * - ParamList 从 `(` 到 `)`；无括号的箭头函数取唯一参数的位置
 * - 函数体的指令序言决定函数内的严格模式
 */

import ts from 'typescript';
import { Node, NodeDraft } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Node as AstNode, DeclaredType, DocInfo, FunctionNode, Position, TypeExpression } from '../types.js';
import {
  checkModifiers,
  hasModifier,
  missingExpression,
  missingStatement,
  syntheticEmpty,
  withDoc,
  withMeta,
} from './build-utils.js';
import type { BuilderContext } from './context.js';
import { Es6Feature, EsNextFeature } from './es-features.js';
import { buildExpression, buildIdentifier, buildPropertyKey, identifierKey, type PropertyKey } from './expr-builder.js';
import { buildBindingName } from './pattern-builder.js';
import { buildStatements, splitPrologue } from './stmt-builder.js';
import { inlineDeclaredType } from './type-syntax.js';

export type FunctionLike =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

export interface FunctionOptions {
  readonly declaration: boolean;
  /** 函数节点位置，默认取具体节点的跨度 */
  readonly position?: Position;
}

// ---------------------------------------------------------------------------
// 函数
// ---------------------------------------------------------------------------

export function buildFunction(
  ctx: BuilderContext,
  node: FunctionLike,
  doc: DocInfo | null,
  options: FunctionOptions
): FunctionNode {
  const arrow = ts.isArrowFunction(node);
  const generator = node.asteriskToken !== undefined;
  const isAsync = hasModifier(node, ts.SyntaxKind.AsyncKeyword);
  if (arrow) ctx.es6(Es6Feature.arrowFunctions, node);
  if (generator) ctx.es6(Es6Feature.generators, node);
  if (isAsync) ctx.esNext(EsNextFeature.asyncFunctions, node);
  if (node.typeParameters && node.typeParameters.length > 0) {
    ctx.report(Diagnostics.unsupportedFeature('generic functions', ctx.span(node)));
  }

  let nameDoc: DocInfo | null = null;
  let name: AstNode = Node.name('', ctx.frame(null));
  if ((ts.isFunctionDeclaration(node) || ts.isFunctionExpression(node)) && node.name) {
    nameDoc = ctx.claimInline(node.name);
    name = withDoc(buildIdentifier(ctx, node.name), nameDoc);
  }

  const body = node.body;
  const prologue = body !== undefined && ts.isBlock(body) ? splitPrologue(body.statements) : null;
  const directives = prologue?.directives ?? null;
  const strict = ctx.isStrict() || (directives?.has('use strict') ?? false);

  return ctx.withScope({ strict }, () => {
    const params = buildParamList(ctx, node, doc);
    const returnType = returnDeclaredType(ctx, node, doc, nameDoc);
    const bodyNode = ctx.withScope({ functionDepth: ctx.scope.functionDepth + 1 }, (): AstNode => {
      if (body === undefined) return missingStatement(ctx, node, 'function overloads');
      if (ts.isBlock(body)) {
        return Node.plain('Block', buildStatements(ctx, prologue?.body ?? body.statements), ctx.frameOf(body));
      }
      return buildExpression(ctx, body);
    });
    const fn = Node.func(
      name,
      params,
      bodyNode,
      { directives, arrow, generator, async: isAsync, declaration: options.declaration },
      ctx.frame(options.position ?? ctx.span(node))
    );
    return withMeta(fn, returnType, null);
  });
}

/**
 * 返回类型：内联 `: T`，否则取函数名上的内联文档注释或 `@return`。
 */
function returnDeclaredType(
  ctx: BuilderContext,
  node: FunctionLike,
  doc: DocInfo | null,
  nameDoc: DocInfo | null
): DeclaredType | undefined {
  return inlineDeclaredType(ctx, node.type, nameDoc?.type ?? doc?.returnType);
}

/** `(` 到 `)` 的跨度；没有括号的箭头函数取其唯一参数 */
function paramListPosition(ctx: BuilderContext, node: FunctionLike): Position {
  const params = node.parameters;
  let open = params.pos - 1;
  if (ts.isArrowFunction(node)) {
    const asyncModifier = ts.getModifiers(node)?.find(modifier => modifier.kind === ts.SyntaxKind.AsyncKeyword);
    const start = asyncModifier ? ctx.skipTrivia(asyncModifier.end) : node.getStart(ctx.root);
    if (ctx.text[start] !== '(') {
      const only = params[0];
      return only ? ctx.span(only) : ctx.range(start, start);
    }
    open = start;
  }
  const close = ctx.skipTrivia(params.end);
  return ctx.range(open, ctx.text[close] === ')' ? close + 1 : close);
}

/** 成员函数节点从参数列表的 `(` 开始 */
function memberFunctionPosition(ctx: BuilderContext, node: FunctionLike): Position {
  return ctx.range(paramListPosition(ctx, node).offset, node.end);
}

function buildParamList(ctx: BuilderContext, node: FunctionLike, doc: DocInfo | null): AstNode {
  const draft = new NodeDraft();
  for (const param of node.parameters) draft.add(buildParameter(ctx, param, doc));
  return draft.close(children => Node.plain('ParamList', children, ctx.frame(paramListPosition(ctx, node))));
}

function optionalType(type: TypeExpression): TypeExpression {
  return { kind: 'OptionalType', type, position: type.position };
}

function buildParameter(ctx: BuilderContext, param: ts.ParameterDeclaration, doc: DocInfo | null): AstNode {
  checkModifiers(ctx, param, []);
  if (ts.isIdentifier(param.name) && param.name.text === 'this') {
    return missingExpression(ctx, param, 'this parameters');
  }

  const inlineDoc = ctx.claimInline(param);
  let target = buildBindingName(ctx, param.name);

  if (ts.isIdentifier(param.name)) {
    const paramName = param.name.text;
    const docType = inlineDoc?.type ?? doc?.params.find(entry => entry.name === paramName)?.type;
    const declaredType = inlineDeclaredType(ctx, param.type, docType, param.questionToken ? optionalType : undefined);
    target = withMeta(target, declaredType, inlineDoc);
  } else {
    if (param.type !== undefined) {
      // 带类型的解构参数尚不支持：在冒号处报告
      const colon = ctx.skipTrivia(param.name.end);
      ctx.report(Diagnostics.expectedToken(',', ctx.range(colon, colon + 1)));
    }
    target = withDoc(target, inlineDoc);
  }

  if (param.dotDotDotToken) {
    ctx.es6(Es6Feature.restParameters, param);
    return Node.plain('Rest', [target], ctx.frameOf(param));
  }
  if (param.initializer) {
    ctx.es6(Es6Feature.defaultParameters, param);
    const value = buildExpression(ctx, param.initializer);
    const position = ctx.range(param.name.getStart(ctx.root), param.end);
    return Node.plain('DefaultValue', [target, value], ctx.frame(position));
  }
  return target;
}

// ---------------------------------------------------------------------------
// 类
// ---------------------------------------------------------------------------

/**
 * `Class(Name | Empty, Superclass | Empty, ClassMembers)`；类体总是严格模式。
 */
export function buildClass(ctx: BuilderContext, node: ts.ClassLikeDeclaration, position: Position): AstNode {
  ctx.es6(Es6Feature.classes, node);
  return ctx.withScope({ strict: true }, () => {
    if (node.typeParameters && node.typeParameters.length > 0) {
      ctx.report(Diagnostics.unsupportedFeature('generic classes', ctx.span(node)));
    }
    const name = node.name ? buildIdentifier(ctx, node.name) : syntheticEmpty(ctx);
    let superclass = syntheticEmpty(ctx);
    for (const clause of node.heritageClauses ?? []) {
      if (clause.token === ts.SyntaxKind.ImplementsKeyword) {
        ctx.report(Diagnostics.unsupportedFeature('implements clauses', ctx.span(clause)));
        continue;
      }
      const base = clause.types[0];
      if (base === undefined) continue;
      if (base.typeArguments) ctx.report(Diagnostics.unsupportedFeature('type arguments', ctx.span(base)));
      superclass = buildExpression(ctx, base.expression);
    }
    const members = buildClassMembers(ctx, node);
    return Node.plain('Class', [name, superclass, members], ctx.frame(position));
  });
}

function buildClassMembers(ctx: BuilderContext, node: ts.ClassLikeDeclaration): AstNode {
  const draft = new NodeDraft();
  for (const member of node.members) {
    if (ts.isSemicolonClassElement(member)) continue;
    const doc = ctx.claim(member);
    draft.add(withDoc(buildClassMember(ctx, member, doc), doc));
  }
  const open = node.members.pos - 1;
  const close = ctx.skipTrivia(node.members.end);
  const position = ctx.range(open, ctx.text[close] === '}' ? close + 1 : close);
  return draft.close(children => Node.plain('ClassMembers', children, ctx.frame(position)));
}

function buildClassMember(ctx: BuilderContext, member: ts.ClassElement, doc: DocInfo | null): AstNode {
  const isStatic = hasModifier(member, ts.SyntaxKind.StaticKeyword);

  if (ts.isConstructorDeclaration(member)) {
    checkModifiers(ctx, member, []);
    const fn = buildFunction(ctx, member, doc, { declaration: false, position: memberFunctionPosition(ctx, member) });
    return Node.memberFunction('constructor', false, fn, ctx.frameOf(member));
  }
  if (ts.isMethodDeclaration(member)) {
    checkModifiers(ctx, member, [ts.SyntaxKind.StaticKeyword, ts.SyntaxKind.AsyncKeyword]);
    if (member.questionToken) ctx.report(Diagnostics.unsupportedFeature('optional methods', ctx.span(member)));
    return buildMethod(ctx, member, isStatic, doc);
  }
  if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
    checkModifiers(ctx, member, [ts.SyntaxKind.StaticKeyword]);
    return buildAccessor(ctx, member, isStatic, doc);
  }
  if (ts.isPropertyDeclaration(member)) {
    checkModifiers(ctx, member, [ts.SyntaxKind.StaticKeyword]);
    return buildField(ctx, member, isStatic, doc);
  }
  if (ts.isClassStaticBlockDeclaration(member)) return missingStatement(ctx, member, 'class static blocks');
  if (ts.isIndexSignatureDeclaration(member)) return missingStatement(ctx, member, 'index signatures');
  return missingStatement(ctx, member, ts.SyntaxKind[member.kind]);
}

/** 成员定义从键开始，到函数体或初始值结束 */
function memberPosition(ctx: BuilderContext, member: ts.ClassElement | ts.ObjectLiteralElement, key: ts.Node): Position {
  return ctx.range(key.getStart(ctx.root), member.end);
}

function buildMethod(ctx: BuilderContext, member: ts.MethodDeclaration, isStatic: boolean, doc: DocInfo | null): AstNode {
  const key = buildPropertyKey(ctx, member.name);
  const fn = buildFunction(ctx, member, doc, { declaration: false, position: memberFunctionPosition(ctx, member) });
  const frame = ctx.frame(memberPosition(ctx, member, member.name));
  switch (key.kind) {
    case 'computed':
      return Node.computedProp('method', isStatic, key.expression, fn, frame);
    case 'private':
      return key.placeholder;
    case 'plain':
      return Node.memberFunction(key.value, isStatic, fn, frame);
  }
}

function buildAccessor(
  ctx: BuilderContext,
  member: ts.GetAccessorDeclaration | ts.SetAccessorDeclaration,
  isStatic: boolean,
  doc: DocInfo | null
): AstNode {
  const getter = ts.isGetAccessorDeclaration(member);
  if (ctx.config.mode === 'ES3') {
    const position = ctx.span(member);
    ctx.report(getter ? Diagnostics.getterUnsupported(position) : Diagnostics.setterUnsupported(position));
  }
  const key = buildPropertyKey(ctx, member.name);
  const fn = buildFunction(ctx, member, doc, { declaration: false, position: memberFunctionPosition(ctx, member) });
  const frame = ctx.frame(memberPosition(ctx, member, member.name));
  switch (key.kind) {
    case 'computed':
      return Node.computedProp(getter ? 'getter' : 'setter', isStatic, key.expression, fn, frame);
    case 'private':
      return key.placeholder;
    case 'plain':
      return Node.accessor(
        getter ? 'GetterDef' : 'SetterDef',
        key.value,
        { quoted: key.quoted, numeric: key.numeric, static: isStatic },
        fn,
        frame
      );
  }
}

function buildField(ctx: BuilderContext, member: ts.PropertyDeclaration, isStatic: boolean, doc: DocInfo | null): AstNode {
  ctx.esNext(EsNextFeature.classFields, member);
  if (member.questionToken) ctx.report(Diagnostics.unsupportedFeature('optional class fields', ctx.span(member)));
  if (member.exclamationToken) {
    ctx.report(Diagnostics.unsupportedFeature('definite assignment assertions', ctx.span(member)));
  }
  const key = buildPropertyKey(ctx, member.name);
  const declaredType = inlineDeclaredType(ctx, member.type, doc?.type);
  const value = member.initializer ? buildExpression(ctx, member.initializer) : null;
  const frame = ctx.frame(memberPosition(ctx, member, member.name));
  switch (key.kind) {
    case 'computed':
      return withMeta(Node.computedProp('field', isStatic, key.expression, value, frame), declaredType, null);
    case 'private':
      return key.placeholder;
    case 'plain':
      return withMeta(Node.memberField(key.value, isStatic, value ? [value] : [], frame), declaredType, null);
  }
}

// ---------------------------------------------------------------------------
// 对象字面量
// ---------------------------------------------------------------------------

export function buildObjectLiteral(ctx: BuilderContext, node: ts.ObjectLiteralExpression): AstNode {
  const draft = new NodeDraft();
  for (const property of node.properties) {
    const doc = ctx.claim(property);
    draft.add(withDoc(buildObjectProperty(ctx, property, doc), doc));
  }
  return draft.close(children => Node.plain('ObjectLit', children, ctx.frameOf(node)));
}

function keyedValue(ctx: BuilderContext, key: PropertyKey, value: AstNode, property: ts.Node): AstNode {
  switch (key.kind) {
    case 'computed':
      return Node.computedProp('value', false, key.expression, value, ctx.frameOf(property));
    case 'private':
      return key.placeholder;
    case 'plain':
      return Node.stringKey(key.value, key, [value], ctx.frame(key.position));
  }
}

function buildObjectProperty(ctx: BuilderContext, property: ts.ObjectLiteralElementLike, doc: DocInfo | null): AstNode {
  if (ts.isPropertyAssignment(property)) {
    const key = buildPropertyKey(ctx, property.name);
    return keyedValue(ctx, key, buildExpression(ctx, property.initializer), property);
  }

  if (ts.isShorthandPropertyAssignment(property)) {
    ctx.es6(Es6Feature.extendedObjectLiterals, property);
    const key = identifierKey(ctx, property.name);
    if (property.objectAssignmentInitializer) {
      ctx.report(
        Diagnostics.syntaxError(
          "Did you mean to use a ':'? An '=' can only follow a property name " +
            'when the containing object literal is part of a destructuring pattern',
          ctx.span(property)
        )
      );
    }
    return keyedValue(ctx, key, buildIdentifier(ctx, property.name), property);
  }

  if (ts.isSpreadAssignment(property)) {
    ctx.esNext(EsNextFeature.objectSpread, property);
    return Node.plain('Spread', [buildExpression(ctx, property.expression)], ctx.frameOf(property));
  }

  if (ts.isMethodDeclaration(property)) {
    ctx.es6(Es6Feature.memberDeclarations, property);
    checkModifiers(ctx, property, [ts.SyntaxKind.AsyncKeyword]);
    return buildMethod(ctx, property, false, doc);
  }

  checkModifiers(ctx, property, []);
  return buildAccessor(ctx, property, false, doc);
}
