/**
 * @module type-syntax
 *
 * 内联类型语法（`: Type`）到 TypeExpression 的转换，以及声明类型槽位的互斥规则。
 *
 * 支持：基本类型与命名类型（含类型参数）、any、void、数组、联合、括号、
 * 函数类型、对象字面量记录类型。其余类型形式报告为不支持的语言特性。
 */

import ts from 'typescript';
import { supportsTypeSyntax } from '../config/language-config.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { DeclaredType, FunctionTypeParam, RecordField, TypeExpression } from '../types.js';
import type { BuilderContext } from './context.js';

const UNSUPPORTED_TYPE_FORMS: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.IntersectionType, 'intersection types'],
  [ts.SyntaxKind.TupleType, 'tuple types'],
  [ts.SyntaxKind.LiteralType, 'literal types'],
  [ts.SyntaxKind.ConditionalType, 'conditional types'],
  [ts.SyntaxKind.TypeQuery, 'type queries'],
  [ts.SyntaxKind.MappedType, 'mapped types'],
  [ts.SyntaxKind.IndexedAccessType, 'indexed access types'],
  [ts.SyntaxKind.TypeOperator, 'type operators'],
  [ts.SyntaxKind.ConstructorType, 'constructor types'],
  [ts.SyntaxKind.TemplateLiteralType, 'template literal types'],
  [ts.SyntaxKind.TypePredicate, 'type predicates'],
  [ts.SyntaxKind.InferType, 'infer types'],
  [ts.SyntaxKind.ThisType, 'this types'],
  [ts.SyntaxKind.ImportType, 'import types'],
]);

const NAMED_KEYWORDS: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.NumberKeyword, 'number'],
  [ts.SyntaxKind.StringKeyword, 'string'],
  [ts.SyntaxKind.BooleanKeyword, 'boolean'],
  [ts.SyntaxKind.SymbolKeyword, 'symbol'],
  [ts.SyntaxKind.ObjectKeyword, 'object'],
  [ts.SyntaxKind.UndefinedKeyword, 'undefined'],
  [ts.SyntaxKind.NeverKeyword, 'never'],
  [ts.SyntaxKind.BigIntKeyword, 'bigint'],
  [ts.SyntaxKind.UnknownKeyword, 'unknown'],
]);

function entityName(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : `${entityName(name.left)}.${name.right.text}`;
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  return null;
}

export function convertTypeNode(ctx: BuilderContext, node: ts.TypeNode): TypeExpression {
  const position = ctx.span(node);

  if (node.kind === ts.SyntaxKind.AnyKeyword) return { kind: 'AnyType', position };
  if (node.kind === ts.SyntaxKind.VoidKeyword) return { kind: 'VoidType', position };

  const keyword = NAMED_KEYWORDS.get(node.kind);
  if (keyword !== undefined) return { kind: 'NamedType', name: keyword, typeArguments: [], position };

  if (ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword) {
    return { kind: 'NamedType', name: 'null', typeArguments: [], position };
  }

  if (ts.isTypeReferenceNode(node)) {
    return {
      kind: 'NamedType',
      name: entityName(node.typeName),
      typeArguments: (node.typeArguments ?? []).map(arg => convertTypeNode(ctx, arg)),
      position,
    };
  }

  if (ts.isArrayTypeNode(node)) {
    return { kind: 'ArrayType', element: convertTypeNode(ctx, node.elementType), position };
  }

  if (ts.isUnionTypeNode(node)) {
    return { kind: 'UnionType', alternatives: node.types.map(t => convertTypeNode(ctx, t)), position };
  }

  if (ts.isParenthesizedTypeNode(node)) return convertTypeNode(ctx, node.type);

  if (ts.isFunctionTypeNode(node)) return convertFunctionType(ctx, node);

  if (ts.isTypeLiteralNode(node)) return convertRecordType(ctx, node);

  return unsupported(ctx, node, UNSUPPORTED_TYPE_FORMS.get(node.kind) ?? ts.SyntaxKind[node.kind]);
}

function unsupported(ctx: BuilderContext, node: ts.Node, feature: string): TypeExpression {
  const position = ctx.span(node);
  ctx.report(Diagnostics.unsupportedFeature(feature, position));
  return { kind: 'UnknownType', position };
}

function convertFunctionType(ctx: BuilderContext, node: ts.FunctionTypeNode): TypeExpression {
  if (node.typeParameters && node.typeParameters.length > 0) {
    return unsupported(ctx, node, 'generic function types');
  }
  const params: FunctionTypeParam[] = node.parameters.map(param => {
    const name = ts.isIdentifier(param.name) ? param.name.text : null;
    let type: TypeExpression = param.type
      ? convertTypeNode(ctx, param.type)
      : { kind: 'AnyType', position: null };
    if (param.questionToken) type = { kind: 'OptionalType', type, position: type.position };
    if (param.dotDotDotToken) type = { kind: 'RestType', type, position: ctx.span(param) };
    return { name, type };
  });
  return {
    kind: 'FunctionType',
    params,
    returnType: convertTypeNode(ctx, node.type),
    thisType: null,
    newType: null,
    position: ctx.span(node),
  };
}

function convertRecordType(ctx: BuilderContext, node: ts.TypeLiteralNode): TypeExpression {
  const fields: RecordField[] = [];
  for (const member of node.members) {
    if (!ts.isPropertySignature(member)) {
      return unsupported(ctx, member, 'record type members other than properties');
    }
    const name = propertyName(member.name);
    if (name === null) return unsupported(ctx, member.name, 'computed record type keys');
    fields.push({
      name,
      type: member.type ? convertTypeNode(ctx, member.type) : null,
      optional: member.questionToken !== undefined,
    });
  }
  return { kind: 'RecordType', fields, position: ctx.span(node) };
}

/**
 * 处理一个类型槽位。
 *
 * - 没有内联注解时，槽位的文档注释类型即声明类型
 * - 非 ES6_TYPED 模式下警告类型语法未启用（注解仍被转换）
 * - 槽位已有文档注释类型时报告冲突，保留文档注释类型
 */
export function inlineDeclaredType(
  ctx: BuilderContext,
  annotation: ts.TypeNode | undefined,
  docType: TypeExpression | null | undefined,
  wrap?: (type: TypeExpression) => TypeExpression
): DeclaredType | undefined {
  if (annotation === undefined) return docDeclaredType(docType);
  const position = ctx.span(annotation);
  if (!supportsTypeSyntax(ctx.config.mode)) {
    ctx.report(Diagnostics.typeSyntaxNotEnabled(position));
  }
  const converted = convertTypeNode(ctx, annotation);
  if (docType) {
    ctx.report(Diagnostics.jsDocInlineConflict(position));
    return docDeclaredType(docType);
  }
  return { source: 'inline', expression: wrap ? wrap(converted) : converted };
}

/** 文档注释中的类型作为声明类型 */
function docDeclaredType(type: TypeExpression | null | undefined): DeclaredType | undefined {
  return type ? { source: 'jsdoc', expression: type } : undefined;
}
