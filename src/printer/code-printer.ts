/**
 * @module code-printer
 *
 * 校验用的代码打印器：把 AST 打印回可重新解析的源码。
 *
 * 格式约定：
 * - 两个空格缩进，每条语句独占一行
 * - 只在两个单词字符相邻时插入空格（`return'x'`、`function/** T *\/foo`）
 * - 内联文档注释打印为 `/** T *\/`，其余文档注释打印原文
 * - 内联类型打印为 `: T`（TypeScript 语法）
 */

import { typeToString } from '../ast/ast_visitor.js';
import type {
  ComputedPropNode,
  DeclaredType,
  ExportNode,
  FunctionNode,
  Node,
  NodeKind,
  ScriptNode,
  TypeExpression,
} from '../types.js';

const WORD_CHAR = /[A-Za-z0-9_$\\]/;
const IDENTIFIER_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** 运算优先级，数值越大结合越紧 */
const PRECEDENCE: Partial<Record<NodeKind, number>> = {
  Comma: 0,
  Hook: 2,
  Or: 3,
  Coalesce: 3,
  And: 4,
  BitOr: 5,
  BitXor: 6,
  BitAnd: 7,
  Eq: 8,
  Ne: 8,
  ShEq: 8,
  ShNe: 8,
  Lt: 9,
  Le: 9,
  Gt: 9,
  Ge: 9,
  InstanceOf: 9,
  In: 9,
  Lsh: 10,
  Rsh: 10,
  Ursh: 10,
  Add: 11,
  Sub: 11,
  Mul: 12,
  Div: 12,
  Mod: 12,
  Exponent: 13,
  Not: 14,
  BitNot: 14,
  Pos: 14,
  Neg: 14,
  Typeof: 14,
  Void: 14,
  DelProp: 14,
  Await: 14,
  New: 17,
  Call: 17,
  GetProp: 17,
  GetElem: 17,
};

const ASSIGNMENT = 1;
const UNARY = 14;
const POSTFIX = 15;
const MEMBER = 17;
const PRIMARY = 18;

const OPERATORS: Partial<Record<NodeKind, string>> = {
  Comma: ',',
  Or: '||',
  And: '&&',
  Coalesce: '??',
  BitOr: '|',
  BitXor: '^',
  BitAnd: '&',
  Eq: '==',
  Ne: '!=',
  ShEq: '===',
  ShNe: '!==',
  Lt: '<',
  Le: '<=',
  Gt: '>',
  Ge: '>=',
  InstanceOf: 'instanceof',
  In: 'in',
  Lsh: '<<',
  Rsh: '>>',
  Ursh: '>>>',
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
  Mod: '%',
  Exponent: '**',
  Assign: '=',
  AssignBitOr: '|=',
  AssignBitXor: '^=',
  AssignBitAnd: '&=',
  AssignLsh: '<<=',
  AssignRsh: '>>=',
  AssignUrsh: '>>>=',
  AssignAdd: '+=',
  AssignSub: '-=',
  AssignMul: '*=',
  AssignDiv: '/=',
  AssignMod: '%=',
  AssignExponent: '**=',
  AssignOr: '||=',
  AssignAnd: '&&=',
  AssignCoalesce: '??=',
};

const UNARY_OPERATORS: Partial<Record<NodeKind, string>> = {
  Not: '!',
  BitNot: '~',
  Pos: '+',
  Neg: '-',
  Typeof: 'typeof',
  Void: 'void',
  DelProp: 'delete',
  Await: 'await',
};

const DECLARATION_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(['Var', 'Let', 'Const', 'Class', 'Function']);

function isAssignKind(kind: NodeKind): boolean {
  return kind.startsWith('Assign');
}

function precedence(node: Node): number {
  if (isAssignKind(node.kind)) return ASSIGNMENT;
  switch (node.kind) {
    case 'Yield':
    case 'Spread':
      return ASSIGNMENT;
    case 'Function':
      return node.arrow ? ASSIGNMENT : PRIMARY;
    case 'Inc':
    case 'Dec':
      return node.postfix ? POSTFIX : UNARY;
    case 'Number':
      return node.value < 0 || Object.is(node.value, -0) ? UNARY : PRIMARY;
    default:
      return PRECEDENCE[node.kind] ?? PRIMARY;
  }
}

/** `??` 不能与 `||` / `&&` 直接混用 */
function mixesCoalesce(parent: NodeKind, child: Node): boolean {
  if (parent === 'Coalesce') return child.kind === 'Or' || child.kind === 'And';
  if (parent === 'Or' || parent === 'And') return child.kind === 'Coalesce';
  return false;
}

/** 语句开头不能是 function、class 或 `{` */
function startsAmbiguously(node: Node): boolean {
  let current: Node | undefined = node;
  while (current !== undefined) {
    switch (current.kind) {
      case 'Function':
        return !current.arrow;
      case 'Class':
      case 'ObjectLit':
        return true;
      case 'Call':
      case 'GetProp':
      case 'GetElem':
      case 'Hook':
      case 'TemplateLit':
        current = current.children[0];
        break;
      case 'Inc':
      case 'Dec':
        if (!current.postfix) return false;
        current = current.children[0];
        break;
      default:
        if (OPERATORS[current.kind] === undefined) return false;
        current = current.children[0];
        break;
    }
  }
  return false;
}

/** new 的被调用者中不能含有调用 */
function containsCall(node: Node): boolean {
  switch (node.kind) {
    case 'Call':
      return true;
    case 'GetProp':
    case 'GetElem':
      return containsCall(node.children[0]);
    default:
      return false;
  }
}

export function quoteString(value: string): string {
  let out = "'";
  for (const ch of value) {
    switch (ch) {
      case '\\':
        out += '\\\\';
        break;
      case "'":
        out += "\\'";
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\u2028':
        out += '\\u2028';
        break;
      case '\u2029':
        out += '\\u2029';
        break;
      default: {
        const code = ch.charCodeAt(0);
        out += code < 0x20 || code === 0x7f ? `\\x${code.toString(16).padStart(2, '0')}` : ch;
      }
    }
  }
  return `${out}'`;
}

function keyText(value: string, quoted: boolean, numeric: boolean): string {
  if (numeric) return value;
  if (quoted || !IDENTIFIER_NAME.test(value)) return quoteString(value);
  return value;
}

/** 内联类型的 TypeScript 语法 */
export function typeToTypeScript(type: TypeExpression): string {
  switch (type.kind) {
    case 'NamedType':
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(typeToTypeScript).join(', ')}>`;
    case 'AnyType':
      return 'any';
    case 'UnknownType':
      return 'unknown';
    case 'VoidType':
      return 'void';
    case 'NullableType':
      return `${typeToTypeScript(type.type)} | null`;
    case 'NonNullableType':
      return typeToTypeScript(type.type);
    case 'OptionalType':
      return `${typeToTypeScript(type.type)} | undefined`;
    case 'RestType':
      return type.type === null ? 'any[]' : typeToTypeScript(type.type);
    case 'UnionType':
      return type.alternatives.map(alternative => wrapFunctionType(alternative)).join(' | ');
    case 'ArrayType': {
      const element = typeToTypeScript(type.element);
      return type.element.kind === 'UnionType' || type.element.kind === 'FunctionType'
        ? `(${element})[]`
        : `${element}[]`;
    }
    case 'RecordType':
      return `{${type.fields
        .map(field => `${field.name}${field.optional ? '?' : ''}${field.type ? `: ${typeToTypeScript(field.type)}` : ''}`)
        .join(', ')}}`;
    case 'FunctionType': {
      const params = type.params.map((param, index) => {
        const name = param.name ?? `p${index}`;
        if (param.type.kind === 'OptionalType') return `${name}?: ${typeToTypeScript(param.type.type)}`;
        if (param.type.kind === 'RestType') return `...${name}: ${typeToTypeScript(param.type)}`;
        return `${name}: ${typeToTypeScript(param.type)}`;
      });
      const result = type.returnType ? typeToTypeScript(type.returnType) : 'void';
      return `(${params.join(', ')}) => ${result}`;
    }
  }
}

function wrapFunctionType(type: TypeExpression): string {
  const text = typeToTypeScript(type);
  return type.kind === 'FunctionType' ? `(${text})` : text;
}

function typeAnnotation(declared: DeclaredType | undefined): string {
  if (declared === undefined || declared.source !== 'inline') return '';
  const type = declared.expression;
  if (type.kind === 'OptionalType') return `?: ${typeToTypeScript(type.type)}`;
  return `: ${typeToTypeScript(type)}`;
}

class CodePrinter {
  private out = '';
  private depth = 0;

  result(): string {
    return this.out;
  }

  /** 追加一段文本；两个单词字符相邻或会粘连成其他运算符时插入空格 */
  private token(text: string): void {
    if (text === '') return;
    const last = this.out.charAt(this.out.length - 1);
    const first = text.charAt(0);
    const glue =
      (WORD_CHAR.test(last) && WORD_CHAR.test(first)) ||
      (last === '+' && first === '+') ||
      (last === '-' && first === '-') ||
      (last === '/' && first === '/');
    this.out += glue ? ` ${text}` : text;
  }

  private raw(text: string): void {
    this.out += text;
  }

  private newline(): void {
    this.out += `\n${'  '.repeat(this.depth)}`;
  }

  private doc(node: Node): void {
    const doc = node.docInfo;
    if (doc === undefined) return;
    if (doc.inline && doc.type !== null) this.token(`/** ${typeToString(doc.type)} */`);
    else this.token(doc.raw);
  }

  // -------------------------------------------------------------------------
  // 语句
  // -------------------------------------------------------------------------

  script(node: ScriptNode): void {
    let first = true;
    for (const directive of node.directives ?? []) {
      if (!first) this.newline();
      this.token(`${quoteString(directive)};`);
      first = false;
    }
    for (const statement of node.children) {
      if (!first) this.newline();
      this.statement(statement);
      first = false;
    }
  }

  private statementDoc(node: Node): void {
    const holder = node.kind === 'Export' ? node.children[0] : node;
    const doc = holder?.docInfo;
    if (doc === undefined || doc.inline) return;
    this.token(doc.raw);
    this.newline();
  }

  statement(node: Node, withDoc = true): void {
    if (withDoc) this.statementDoc(node);
    switch (node.kind) {
      case 'ExprResult':
        this.expressionStatement(node.children[0]);
        this.raw(';');
        return;
      case 'Var':
      case 'Let':
      case 'Const':
        this.declarationList(node);
        this.raw(';');
        return;
      case 'Function':
        this.func(node);
        return;
      case 'Class':
        this.classNode(node);
        return;
      case 'Block':
        this.block(node);
        return;
      case 'Empty':
        this.raw(';');
        return;
      case 'If':
        this.token('if');
        this.raw(' (');
        this.expression(node.children[0], 0);
        this.raw(') ');
        this.block(node.children[1]);
        if (node.children[2]) {
          this.raw(' else ');
          this.block(node.children[2]);
        }
        return;
      case 'While':
        this.token('while');
        this.raw(' (');
        this.expression(node.children[0], 0);
        this.raw(') ');
        this.block(node.children[1]);
        return;
      case 'Do':
        this.token('do');
        this.raw(' ');
        this.block(node.children[0]);
        this.raw(' while (');
        this.expression(node.children[1], 0);
        this.raw(');');
        return;
      case 'For':
        this.token('for');
        this.raw(' (');
        this.forInit(node.children[0]);
        this.raw(';');
        if (node.children[1]?.kind !== 'Empty') this.raw(' ');
        this.optionalExpression(node.children[1]);
        this.raw(';');
        if (node.children[2]?.kind !== 'Empty') this.raw(' ');
        this.optionalExpression(node.children[2]);
        this.raw(') ');
        this.block(node.children[3]);
        return;
      case 'ForIn':
      case 'ForOf':
      case 'ForAwaitOf':
        this.token(node.kind === 'ForAwaitOf' ? 'for await' : 'for');
        this.raw(' (');
        this.forInit(node.children[0]);
        this.raw(node.kind === 'ForIn' ? ' in ' : ' of ');
        this.expression(node.children[1], node.kind === 'ForIn' ? 0 : ASSIGNMENT);
        this.raw(') ');
        this.block(node.children[2]);
        return;
      case 'Break':
      case 'Continue':
        this.token(node.kind === 'Break' ? 'break' : 'continue');
        if (node.children[0]) this.expression(node.children[0], 0);
        this.raw(';');
        return;
      case 'Return':
        this.token('return');
        if (node.children[0]) this.expression(node.children[0], 0);
        this.raw(';');
        return;
      case 'Throw':
        this.token('throw');
        this.expression(node.children[0], 0);
        this.raw(';');
        return;
      case 'Debugger':
        this.token('debugger;');
        return;
      case 'With':
        this.token('with');
        this.raw(' (');
        this.expression(node.children[0], 0);
        this.raw(') ');
        this.block(node.children[1]);
        return;
      case 'Label':
        this.expression(node.children[0], 0);
        this.raw(': ');
        if (node.children[1]) this.statement(node.children[1]);
        return;
      case 'Switch':
        this.switchNode(node);
        return;
      case 'Try':
        this.tryNode(node);
        return;
      case 'Import':
        this.importNode(node);
        return;
      case 'Export':
        this.exportNode(node);
        return;
      default:
        this.expressionStatement(node);
        this.raw(';');
    }
  }

  private expressionStatement(node: Node | undefined): void {
    if (node === undefined) return;
    if (node.docInfo !== undefined && !node.docInfo.inline) {
      this.token(node.docInfo.raw);
      this.newline();
      this.expression(node, 0, false, true);
      return;
    }
    this.expression(node, 0, false, true);
  }

  block(node: Node | undefined): void {
    if (node === undefined) return;
    if (node.children.length === 0) {
      this.token('{}');
      return;
    }
    this.token('{');
    this.depth++;
    for (const statement of node.children) {
      this.newline();
      this.statement(statement);
    }
    this.depth--;
    this.newline();
    this.raw('}');
  }

  private forInit(node: Node | undefined): void {
    if (node === undefined || node.kind === 'Empty') return;
    if (node.kind === 'Var' || node.kind === 'Let' || node.kind === 'Const') this.declarationList(node);
    else this.expression(node, 0);
  }

  private optionalExpression(node: Node | undefined): void {
    if (node !== undefined && node.kind !== 'Empty') this.expression(node, 0);
  }

  private declarationList(node: Node): void {
    this.token(node.kind === 'Var' ? 'var' : node.kind === 'Let' ? 'let' : 'const');
    node.children.forEach((declarator, index) => {
      if (index > 0) this.raw(',');
      this.raw(' ');
      if (declarator.kind === 'DestructuringLhs') {
        this.expression(declarator.children[0], PRIMARY);
        if (declarator.children[1]) {
          this.raw(' = ');
          this.expression(declarator.children[1], ASSIGNMENT);
        }
        return;
      }
      this.name(declarator);
      const init = declarator.children[0];
      if (init) {
        this.raw(' = ');
        this.expression(init, ASSIGNMENT);
      }
    });
  }

  private switchNode(node: Node): void {
    this.token('switch');
    this.raw(' (');
    this.expression(node.children[0], 0);
    this.raw(') {');
    this.depth++;
    for (const clause of node.children.slice(1)) {
      this.newline();
      const body = clause.kind === 'Case' ? clause.children[1] : clause.children[0];
      if (clause.kind === 'Case') {
        this.token('case');
        this.expression(clause.children[0], 0);
      } else {
        this.token('default');
      }
      this.raw(':');
      this.depth++;
      for (const statement of body?.children ?? []) {
        this.newline();
        this.statement(statement);
      }
      this.depth--;
    }
    this.depth--;
    this.newline();
    this.raw('}');
  }

  private tryNode(node: Node): void {
    const [body, handler, finalizer] = node.children;
    this.token('try');
    this.raw(' ');
    this.block(body);
    if (handler && handler.kind === 'Catch') {
      this.raw(' catch ');
      const binding = handler.children[0];
      if (binding && binding.kind !== 'Empty') {
        this.raw('(');
        this.expression(binding, PRIMARY);
        this.raw(') ');
      }
      this.block(handler.children[1]);
    }
    if (finalizer && finalizer.kind === 'Block') {
      this.raw(' finally ');
      this.block(finalizer);
    }
  }

  private importNode(node: Node): void {
    const [defaultBinding, bindings, source] = node.children;
    this.token('import');
    const parts: (() => void)[] = [];
    if (defaultBinding && defaultBinding.kind === 'Name') parts.push(() => this.expression(defaultBinding, 0));
    if (bindings && bindings.kind === 'ImportStar') {
      parts.push(() => {
        this.token('* as');
        if (bindings.children[0]) this.expression(bindings.children[0], 0);
      });
    } else if (bindings && bindings.kind === 'ImportSpecs') {
      parts.push(() => this.specList(bindings));
    }
    parts.forEach((part, index) => {
      this.raw(index === 0 ? ' ' : ', ');
      part();
    });
    if (parts.length > 0) this.raw(' from');
    this.raw(' ');
    if (source) this.expression(source, 0);
    this.raw(';');
  }

  private specList(node: Node): void {
    this.token('{');
    node.children.forEach((spec, index) => {
      if (index > 0) this.raw(', ');
      const [first, second] = spec.children;
      if (first?.kind !== 'Name' || second?.kind !== 'Name') return;
      this.token(keyText(first.value, false, false));
      if (first.value !== second.value) {
        this.raw(' as ');
        this.token(keyText(second.value, false, false));
      }
    });
    this.token('}');
  }

  private exportNode(node: ExportNode): void {
    this.token('export');
    this.raw(' ');
    const [first, second] = node.children;
    if (node.exportAll) {
      this.token('* from ');
      if (first) this.expression(first, 0);
      this.raw(';');
      return;
    }
    if (node.isDefault) this.token('default ');
    if (first === undefined) return;
    if (first.kind === 'ExportSpecs') {
      this.specList(first);
      if (second) {
        this.raw(' from ');
        this.expression(second, 0);
      }
      this.raw(';');
      return;
    }
    if (DECLARATION_KINDS.has(first.kind)) {
      this.statement(first, false);
      return;
    }
    this.expression(first, ASSIGNMENT);
    this.raw(';');
  }

  // -------------------------------------------------------------------------
  // 函数与类
  // -------------------------------------------------------------------------

  private name(node: Node, withDoc = true): void {
    if (node.kind !== 'Name') {
      this.expression(node, PRIMARY);
      return;
    }
    if (withDoc) this.doc(node);
    this.token(node.value);
    this.raw(typeAnnotation(node.declaredType));
  }

  private params(node: Node | undefined): void {
    this.raw('(');
    node?.children.forEach((param, index) => {
      if (index > 0) this.raw(', ');
      this.param(param);
    });
    this.raw(')');
  }

  private param(node: Node): void {
    switch (node.kind) {
      case 'Name':
        this.name(node);
        return;
      case 'DefaultValue':
        if (node.children[0]) this.param(node.children[0]);
        this.raw(' = ');
        if (node.children[1]) this.expression(node.children[1], ASSIGNMENT);
        return;
      case 'Rest':
        this.token('...');
        if (node.children[0]) this.param(node.children[0]);
        return;
      default:
        this.doc(node);
        this.expression(node, PRIMARY, false);
    }
  }

  /** 参数列表、返回类型与函数体 */
  private functionTail(node: FunctionNode): void {
    const [, params, body] = node.children;
    this.params(params);
    this.raw(typeAnnotation(node.declaredType));
    if (node.arrow) {
      this.raw(' => ');
      if (body && body.kind !== 'Block') {
        const wrap = startsAmbiguously(body) || precedence(body) < ASSIGNMENT;
        if (wrap) this.raw('(');
        this.expression(body, wrap ? 0 : ASSIGNMENT);
        if (wrap) this.raw(')');
        return;
      }
    } else {
      this.raw(' ');
    }
    this.functionBody(node, body);
  }

  private functionBody(node: FunctionNode, body: Node | undefined): void {
    const directives = [...(node.directives ?? [])];
    if (directives.length === 0) {
      this.block(body);
      return;
    }
    this.token('{');
    this.depth++;
    for (const directive of directives) {
      this.newline();
      this.token(`${quoteString(directive)};`);
    }
    for (const statement of body?.children ?? []) {
      this.newline();
      this.statement(statement);
    }
    this.depth--;
    this.newline();
    this.raw('}');
  }

  private func(node: FunctionNode): void {
    if (node.async) this.token('async');
    if (!node.arrow) {
      this.token(node.generator ? 'function*' : 'function');
      const name = node.children[0];
      if (name && name.kind === 'Name' && name.value !== '') this.name(name);
    } else if (node.async) {
      this.raw(' ');
    }
    this.functionTail(node);
  }

  /** 成员函数：`static async *key(...) {}`；key 由调用者给出 */
  private method(fn: Node | undefined, prefix: string, key: () => void): void {
    if (fn === undefined || fn.kind !== 'Function') return;
    if (prefix) this.token(prefix);
    if (fn.async) this.token('async');
    if (fn.generator) this.token('*');
    key();
    this.functionTail(fn);
  }

  private staticPrefix(isStatic: boolean): string {
    return isStatic ? 'static' : '';
  }

  private member(node: Node): void {
    this.doc(node);
    if (node.docInfo !== undefined && !node.docInfo.inline) this.raw(' ');
    switch (node.kind) {
      case 'StringKey':
        this.token(keyText(node.value, node.quoted, node.numeric));
        this.raw(': ');
        if (node.children[0]) this.expression(node.children[0], ASSIGNMENT);
        return;
      case 'MemberFunctionDef': {
        const key = keyText(node.value, false, false);
        this.method(node.children[0], this.staticPrefix(node.static), () => this.token(key));
        return;
      }
      case 'GetterDef':
      case 'SetterDef': {
        const prefix = `${node.static ? 'static ' : ''}${node.kind === 'GetterDef' ? 'get' : 'set'}`;
        const key = keyText(node.value, node.quoted, node.numeric);
        this.method(node.children[0], prefix, () => this.token(key));
        return;
      }
      case 'MemberFieldDef':
        if (node.static) this.token('static');
        this.token(keyText(node.value, false, false));
        this.raw(typeAnnotation(node.declaredType));
        if (node.children[0]) {
          this.raw(' = ');
          this.expression(node.children[0], ASSIGNMENT);
        }
        this.raw(';');
        return;
      case 'ComputedProp':
        this.computedProp(node);
        return;
      case 'Spread':
        this.token('...');
        if (node.children[0]) this.expression(node.children[0], ASSIGNMENT);
        return;
      default:
        this.expression(node, ASSIGNMENT);
    }
  }

  private computedProp(node: ComputedPropNode): void {
    const [key, value] = node.children;
    const printKey = (): void => {
      this.token('[');
      if (key) this.expression(key, ASSIGNMENT);
      this.raw(']');
    };
    switch (node.member) {
      case 'value':
        printKey();
        this.raw(': ');
        if (value) this.expression(value, ASSIGNMENT);
        return;
      case 'method':
        this.method(value, this.staticPrefix(node.static), printKey);
        return;
      case 'getter':
      case 'setter':
        this.method(value, `${node.static ? 'static ' : ''}${node.member === 'getter' ? 'get' : 'set'}`, printKey);
        return;
      case 'field':
        if (node.static) this.token('static');
        printKey();
        this.raw(typeAnnotation(node.declaredType));
        if (value) {
          this.raw(' = ');
          this.expression(value, ASSIGNMENT);
        }
        this.raw(';');
    }
  }

  private classNode(node: Node): void {
    const [name, superclass, members] = node.children;
    this.token('class');
    if (name && name.kind === 'Name') this.name(name);
    if (superclass && superclass.kind !== 'Empty') {
      this.token('extends');
      this.expression(superclass, MEMBER);
    }
    this.raw(' ');
    if (members === undefined || members.children.length === 0) {
      this.token('{}');
      return;
    }
    this.token('{');
    this.depth++;
    for (const member of members.children) {
      this.newline();
      this.member(member);
    }
    this.depth--;
    this.newline();
    this.raw('}');
  }

  // -------------------------------------------------------------------------
  // 表达式
  // -------------------------------------------------------------------------

  /**
   * 打印表达式；优先级低于 minPrecedence 时加括号。
   * statementStart 为真时，以 function / class / `{` 开头的表达式也加括号。
   */
  expression(node: Node, minPrecedence: number, withDoc = true, statementStart = false): void {
    const doc = node.docInfo;
    if (withDoc && doc !== undefined && !doc.inline && !statementStart) {
      this.token(doc.raw);
      if (node.kind === 'Function' || node.kind === 'Class') {
        this.raw(' ');
        this.expression(node, minPrecedence, false);
        return;
      }
      this.raw(' (');
      this.expression(node, 0, false);
      this.raw(')');
      return;
    }

    const wrap = precedence(node) < minPrecedence || (statementStart && startsAmbiguously(node));
    if (wrap) this.token('(');
    this.expressionKind(node, withDoc);
    if (wrap) this.raw(')');
  }

  private expressionKind(node: Node, withDoc: boolean): void {
    const operator = OPERATORS[node.kind];
    if (operator !== undefined && node.children.length === 2) {
      this.binary(node, operator);
      return;
    }
    const unary = UNARY_OPERATORS[node.kind];
    if (unary !== undefined) {
      this.token(unary);
      if (node.children[0]) this.expression(node.children[0], UNARY);
      return;
    }

    switch (node.kind) {
      case 'Name':
        this.name(node, withDoc);
        return;
      case 'LabelName':
        this.token(node.value);
        return;
      case 'Number':
        this.token(Object.is(node.value, -0) ? '-0' : String(node.value));
        return;
      case 'BigInt':
        this.token(`${node.value}n`);
        return;
      case 'String':
        this.token(quoteString(node.value));
        return;
      case 'RegExp':
        this.token(node.value);
        return;
      case 'True':
        this.token('true');
        return;
      case 'False':
        this.token('false');
        return;
      case 'Null':
        this.token('null');
        return;
      case 'This':
        this.token('this');
        return;
      case 'Super':
        this.token('super');
        return;
      case 'Empty':
        return;
      case 'TemplateLit':
        this.template(node);
        return;
      case 'ArrayLit':
      case 'ArrayPattern':
        this.list('[', ']', node.children);
        return;
      case 'ObjectLit':
      case 'ObjectPattern':
        this.objectLike(node.children);
        return;
      case 'Function':
        this.func(node);
        return;
      case 'Class':
        this.classNode(node);
        return;
      case 'GetProp':
        this.memberObject(node.children[0]);
        this.raw(node.optional ? '?.' : '.');
        this.propertyName(node.children[1]);
        return;
      case 'GetElem':
        this.memberObject(node.children[0]);
        this.raw(node.optional ? '?.[' : '[');
        this.expression(node.children[1], 0);
        this.raw(']');
        return;
      case 'Call': {
        const [callee, ...args] = node.children;
        if (callee) this.expression(callee, MEMBER);
        if (node.optional) this.raw('?.');
        this.list('(', ')', args);
        return;
      }
      case 'New': {
        const [callee, ...args] = node.children;
        this.token('new');
        if (callee) {
          const wrap = containsCall(callee) || precedence(callee) < MEMBER;
          if (wrap) this.token('(');
          this.expression(callee, wrap ? 0 : MEMBER);
          if (wrap) this.raw(')');
        }
        this.list('(', ')', args);
        return;
      }
      case 'Inc':
      case 'Dec': {
        const symbol = node.kind === 'Inc' ? '++' : '--';
        if (node.postfix) {
          this.expression(node.children[0], POSTFIX + 1);
          this.raw(symbol);
        } else {
          this.token(symbol);
          this.expression(node.children[0], UNARY);
        }
        return;
      }
      case 'Hook':
        this.expression(node.children[0], PRECEDENCE.Or ?? 3);
        this.raw(' ? ');
        if (node.children[1]) this.expression(node.children[1], ASSIGNMENT);
        this.raw(' : ');
        if (node.children[2]) this.expression(node.children[2], ASSIGNMENT);
        return;
      case 'Yield':
        this.token(node.delegate ? 'yield*' : 'yield');
        if (node.children[0]) this.expression(node.children[0], ASSIGNMENT);
        return;
      case 'Spread':
      case 'Rest':
        this.token('...');
        if (node.children[0]) this.expression(node.children[0], ASSIGNMENT);
        return;
      case 'DefaultValue':
        if (node.children[0]) this.expression(node.children[0], MEMBER);
        this.raw(' = ');
        if (node.children[1]) this.expression(node.children[1], ASSIGNMENT);
        return;
      default:
        this.member(node);
    }
  }

  private binary(node: Node, operator: string): void {
    const [left, right] = node.children;
    if (left === undefined || right === undefined) return;
    const own = precedence(node);
    if (isAssignKind(node.kind)) {
      this.expression(left, MEMBER);
    } else if (mixesCoalesce(node.kind, left)) {
      this.token('(');
      this.expression(left, 0);
      this.raw(')');
    } else {
      this.expression(left, node.kind === 'Exponent' ? own + 1 : own);
    }

    this.raw(operator === ',' ? ', ' : ` ${operator} `);

    if (mixesCoalesce(node.kind, right)) {
      this.token('(');
      this.expression(right, 0);
      this.raw(')');
    } else if (isAssignKind(node.kind) || node.kind === 'Exponent') {
      this.expression(right, own);
    } else {
      this.expression(right, own + 1);
    }
  }

  private propertyName(property: Node | undefined): void {
    if (property?.kind === 'String') this.token(property.value);
  }

  /** 属性访问的对象：数字字面量加括号以免 `.` 被当作小数点 */
  private memberObject(node: Node | undefined): void {
    if (node === undefined) return;
    if (node.kind === 'Number') {
      this.token('(');
      this.expression(node, 0);
      this.raw(')');
      return;
    }
    this.expression(node, MEMBER);
  }

  /** 元素列表；末尾的空位需要额外的逗号 */
  private list(open: string, close: string, items: readonly Node[]): void {
    this.token(open);
    items.forEach((item, index) => {
      if (index > 0) this.raw(item.kind === 'Empty' ? ',' : ', ');
      if (item.kind === 'Empty') return;
      this.expression(item, ASSIGNMENT);
    });
    if (items[items.length - 1]?.kind === 'Empty') this.raw(',');
    this.raw(close);
  }

  private objectLike(members: readonly Node[]): void {
    if (members.length === 0) {
      this.token('{}');
      return;
    }
    this.token('{');
    members.forEach((member, index) => {
      if (index > 0) this.raw(', ');
      this.member(member);
    });
    this.raw('}');
  }

  private template(node: Node): void {
    const [tag, ...parts] = node.children;
    if (tag && tag.kind !== 'Empty') this.expression(tag, MEMBER);
    this.token('`');
    for (const part of parts) {
      if (part.kind === 'TemplateString') {
        this.raw(part.raw);
      } else if (part.children[0]) {
        this.raw('${');
        this.expression(part.children[0], 0);
        this.raw('}');
      }
    }
    this.raw('`');
  }
}

/**
 * 打印整棵树。Script 根节点打印为语句序列（无末尾换行），其他节点按表达式或语句打印。
 */
export function printCode(root: Node): string {
  const printer = new CodePrinter();
  if (root.kind === 'Script') printer.script(root);
  else if (DECLARATION_KINDS.has(root.kind) || root.kind === 'ExprResult' || root.kind === 'Block') {
    printer.statement(root);
  } else {
    printer.expression(root, 0);
  }
  return printer.result();
}
