import type { Node, Position, TypeExpression } from '../types.js';

/**
 * AST 遍历器接口与默认实现（只读遍历）。
 *
 * - enter 在访问子节点之前调用，返回 false 时跳过该子树
 * - leave 在全部子节点访问完成后调用
 */
export interface AstVisitor<Ctx> {
  enter?(node: Node, parent: Node | null, ctx: Ctx): boolean | void;
  leave?(node: Node, parent: Node | null, ctx: Ctx): void;
}

/**
 * 先序深度优先遍历。
 */
export function walk<Ctx>(root: Node, visitor: AstVisitor<Ctx>, ctx: Ctx): void {
  const visit = (node: Node, parent: Node | null): void => {
    if (visitor.enter?.(node, parent, ctx) === false) return;
    for (const child of node.children) visit(child, node);
    visitor.leave?.(node, parent, ctx);
  };
  visit(root, null);
}

/**
 * AstVisitor 的默认实现：按种类分派到 visitXxx 钩子，并继续遍历子节点。
 *
 * 子类覆写 visitNode 定制行为，调用 super.visitNode 继续向下。
 */
export class DefaultAstVisitor<Ctx> {
  visit(root: Node, ctx: Ctx): void {
    this.visitNode(root, ctx);
  }

  visitNode(node: Node, ctx: Ctx): void {
    for (const child of node.children) this.visitNode(child, ctx);
  }
}

/** 父节点中位于 index 之后的兄弟节点 */
export function nextSibling(parent: Node, index: number): Node | null {
  return parent.children[index + 1] ?? null;
}

/** 统计子树节点数 */
export function countNodes(root: Node): number {
  let count = 0;
  walk(root, { enter: () => void count++ }, undefined);
  return count;
}

function formatPosition(position: Position | null): string {
  if (position === null) return '<synthetic>';
  return `${position.line}:${position.column}-${position.length}`;
}

/** 节点的载荷（名称、值、标志）的文本形式 */
export function describePayload(node: Node): string {
  const parts: string[] = [];
  switch (node.kind) {
    case 'Name':
    case 'LabelName':
      parts.push(node.value);
      break;
    case 'String':
      parts.push(JSON.stringify(node.value));
      break;
    case 'Number':
      parts.push(String(node.value));
      break;
    case 'BigInt':
      parts.push(`${node.value}n`);
      break;
    case 'RegExp':
      parts.push(node.value);
      break;
    case 'TemplateString':
      parts.push(JSON.stringify(node.raw));
      break;
    case 'StringKey':
      parts.push(node.value);
      if (node.quoted) parts.push('quoted');
      if (node.numeric) parts.push('numeric');
      break;
    case 'GetterDef':
    case 'SetterDef':
      parts.push(node.value);
      if (node.quoted) parts.push('quoted');
      if (node.static) parts.push('static');
      break;
    case 'MemberFunctionDef':
    case 'MemberFieldDef':
      parts.push(node.value);
      if (node.static) parts.push('static');
      break;
    case 'ComputedProp':
      parts.push(node.member);
      if (node.static) parts.push('static');
      break;
    case 'Function':
      if (node.arrow) parts.push('arrow');
      if (node.generator) parts.push('generator');
      if (node.async) parts.push('async');
      if (node.declaration) parts.push('declaration');
      if (node.directives) parts.push(`directives=[${[...node.directives].join(',')}]`);
      break;
    case 'Script':
      if (node.directives) parts.push(`directives=[${[...node.directives].join(',')}]`);
      break;
    case 'Inc':
    case 'Dec':
      parts.push(node.postfix ? 'postfix' : 'prefix');
      break;
    case 'GetProp':
    case 'GetElem':
    case 'Call':
      if (node.optional) parts.push('optional');
      break;
    case 'Yield':
      if (node.delegate) parts.push('delegate');
      break;
    case 'Export':
      if (node.isDefault) parts.push('default');
      if (node.exportAll) parts.push('all');
      break;
    default:
      break;
  }
  return parts.join(' ');
}

/** 类型表达式的 Closure 风格文本 */
export function typeToString(type: TypeExpression): string {
  switch (type.kind) {
    case 'NamedType':
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(typeToString).join(',')}>`;
    case 'AnyType':
      return '*';
    case 'UnknownType':
      return '?';
    case 'VoidType':
      return 'void';
    case 'NullableType':
      return `?${typeToString(type.type)}`;
    case 'NonNullableType':
      return `!${typeToString(type.type)}`;
    case 'OptionalType':
      return `${typeToString(type.type)}=`;
    case 'RestType':
      return type.type === null ? '...' : `...${typeToString(type.type)}`;
    case 'UnionType':
      return `(${type.alternatives.map(typeToString).join('|')})`;
    case 'ArrayType':
      return `${typeToString(type.element)}[]`;
    case 'RecordType':
      return `{${type.fields
        .map(field => (field.type === null ? field.name : `${field.name}: ${typeToString(field.type)}`))
        .join(', ')}}`;
    case 'FunctionType': {
      const params: string[] = [];
      if (type.thisType) params.push(`this:${typeToString(type.thisType)}`);
      if (type.newType) params.push(`new:${typeToString(type.newType)}`);
      for (const param of type.params) params.push(typeToString(param.type));
      const result = type.returnType ? `:${typeToString(type.returnType)}` : '';
      return `function(${params.join(',')})${result}`;
    }
  }
}

/**
 * 缩进的树形转储：每行 `KIND [载荷] 行:列-长度`，声明类型附在末尾。
 */
export function toStringTree(root: Node): string {
  const lines: string[] = [];
  const visit = (node: Node, depth: number): void => {
    const payload = describePayload(node);
    let line = `${'  '.repeat(depth)}${node.kind}${payload ? ` ${payload}` : ''} ${formatPosition(node.position)}`;
    if (node.declaredType) line += ` : ${typeToString(node.declaredType.expression)} (${node.declaredType.source})`;
    if (node.docInfo) line += ' [jsdoc]';
    lines.push(line);
    for (const child of node.children) visit(child, depth + 1);
  };
  visit(root, 0);
  return lines.join('\n');
}

function typesEquivalent(a: TypeExpression | null, b: TypeExpression | null): boolean {
  if (a === null || b === null) return a === b;
  return typeToString(a) === typeToString(b);
}

/**
 * 结构等价：忽略位置与文档注释，比较种类、载荷、声明类型与子树。
 */
export function isEquivalentTo(a: Node, b: Node): boolean {
  if (a.kind !== b.kind) return false;
  if (describePayload(a) !== describePayload(b)) return false;
  if ((a.declaredType === undefined) !== (b.declaredType === undefined)) return false;
  if (a.declaredType && b.declaredType) {
    if (a.declaredType.source !== b.declaredType.source) return false;
    if (!typesEquivalent(a.declaredType.expression, b.declaredType.expression)) return false;
  }
  if (a.children.length !== b.children.length) return false;
  return a.children.every((child, index) => {
    const other = b.children[index];
    return other !== undefined && isEquivalentTo(child, other);
  });
}
