// AST node constructors
import type * as AST from '../types.js';

/** 节点的源码框架：位置与来源文件 */
export interface NodeFrame {
  readonly position: AST.Position | null;
  readonly sourceFile: string;
}

/** 节点关闭后附加的元数据 */
export interface NodeMeta {
  readonly declaredType?: AST.DeclaredType;
  readonly docInfo?: AST.DocInfo;
}

function base<K extends string>(kind: K, children: readonly AST.Node[], frame: NodeFrame): AST.NodeBase<K> {
  return {
    kind,
    children: Object.freeze([...children]),
    position: frame.position,
    sourceFile: frame.sourceFile,
  };
}

export const Node = {
  plain: (kind: AST.PlainKind, children: readonly AST.Node[], frame: NodeFrame): AST.PlainNode =>
    Object.freeze(base(kind, children, frame)),

  unary: (kind: AST.UnaryKind, operand: AST.Node, frame: NodeFrame): AST.UnaryNode =>
    Object.freeze({ ...base(kind, [], frame), children: Object.freeze([operand] as const) }),

  incDec: (kind: AST.IncDecKind, operand: AST.Node, postfix: boolean, frame: NodeFrame): AST.IncDecNode =>
    Object.freeze({ ...base(kind, [], frame), children: Object.freeze([operand] as const), postfix }),

  binary: (kind: AST.BinaryKind, left: AST.Node, right: AST.Node, frame: NodeFrame): AST.BinaryNode =>
    Object.freeze({ ...base(kind, [], frame), children: Object.freeze([left, right] as const) }),

  script: (
    children: readonly AST.Node[],
    directives: ReadonlySet<string> | null,
    comments: readonly AST.Comment[],
    frame: NodeFrame
  ): AST.ScriptNode =>
    Object.freeze({ ...base('Script', children, frame), directives, comments: Object.freeze([...comments]) }),

  func: (
    name: AST.Node,
    params: AST.Node,
    body: AST.Node,
    flags: Pick<AST.FunctionNode, 'directives' | 'arrow' | 'generator' | 'async' | 'declaration'>,
    frame: NodeFrame
  ): AST.FunctionNode =>
    Object.freeze({
      ...base('Function', [name, params, body], frame),
      directives: flags.directives,
      arrow: flags.arrow,
      generator: flags.generator,
      async: flags.async,
      declaration: flags.declaration,
    }),

  name: (value: string, frame: NodeFrame, children: readonly AST.Node[] = []): AST.NameNode =>
    Object.freeze({ ...base('Name', children, frame), value }),

  string: (value: string, frame: NodeFrame): AST.StringNode => Object.freeze({ ...base('String', [], frame), value }),

  labelName: (value: string, frame: NodeFrame): AST.LabelNameNode =>
    Object.freeze({ ...base('LabelName', [], frame), value }),

  number: (value: number, frame: NodeFrame): AST.NumberNode => Object.freeze({ ...base('Number', [], frame), value }),

  bigint: (value: bigint, frame: NodeFrame): AST.BigIntNode => Object.freeze({ ...base('BigInt', [], frame), value }),

  regexp: (value: string, pattern: string, flags: string, frame: NodeFrame): AST.RegExpNode =>
    Object.freeze({ ...base('RegExp', [], frame), value, pattern, flags }),

  templateString: (value: string | null, raw: string, frame: NodeFrame): AST.TemplateStringNode =>
    Object.freeze({ ...base('TemplateString', [], frame), value, raw }),

  stringKey: (
    value: string,
    key: { quoted: boolean; numeric: boolean },
    children: readonly AST.Node[],
    frame: NodeFrame
  ): AST.StringKeyNode =>
    Object.freeze({ ...base('StringKey', children, frame), value, quoted: key.quoted, numeric: key.numeric }),

  accessor: (
    kind: 'GetterDef' | 'SetterDef',
    value: string,
    key: { quoted: boolean; numeric: boolean; static: boolean },
    fn: AST.Node,
    frame: NodeFrame
  ): AST.AccessorNode =>
    Object.freeze({
      ...base(kind, [fn], frame),
      value,
      quoted: key.quoted,
      numeric: key.numeric,
      static: key.static,
    }),

  memberFunction: (value: string, isStatic: boolean, fn: AST.Node, frame: NodeFrame): AST.MemberFunctionDefNode =>
    Object.freeze({ ...base('MemberFunctionDef', [fn], frame), value, static: isStatic }),

  memberField: (
    value: string,
    isStatic: boolean,
    children: readonly AST.Node[],
    frame: NodeFrame
  ): AST.MemberFieldDefNode => Object.freeze({ ...base('MemberFieldDef', children, frame), value, static: isStatic }),

  computedProp: (
    member: AST.ComputedMember,
    isStatic: boolean,
    key: AST.Node,
    value: AST.Node | null,
    frame: NodeFrame
  ): AST.ComputedPropNode =>
    Object.freeze({
      ...base('ComputedProp', value === null ? [key] : [key, value], frame),
      member,
      static: isStatic,
    }),

  getProp: (object: AST.Node, property: AST.Node, optional: boolean, frame: NodeFrame): AST.GetPropNode =>
    Object.freeze({ ...base('GetProp', [object, property], frame), optional }),

  getElem: (object: AST.Node, element: AST.Node, optional: boolean, frame: NodeFrame): AST.GetElemNode =>
    Object.freeze({ ...base('GetElem', [object, element], frame), optional }),

  call: (callee: AST.Node, args: readonly AST.Node[], optional: boolean, frame: NodeFrame): AST.CallNode =>
    Object.freeze({ ...base('Call', [callee, ...args], frame), optional }),

  yield: (operand: AST.Node | null, delegate: boolean, frame: NodeFrame): AST.YieldNode =>
    Object.freeze({ ...base('Yield', operand === null ? [] : [operand], frame), delegate }),

  export: (
    children: readonly AST.Node[],
    flags: { isDefault: boolean; exportAll: boolean },
    frame: NodeFrame
  ): AST.ExportNode =>
    Object.freeze({ ...base('Export', children, frame), isDefault: flags.isDefault, exportAll: flags.exportAll }),
};

/**
 * 关闭节点：附加声明类型与文档信息，返回新的冻结节点。
 */
export function closeNode<N extends AST.Node>(node: N, meta: NodeMeta): N {
  const extra: { declaredType?: AST.DeclaredType; docInfo?: AST.DocInfo } = {};
  if (meta.declaredType !== undefined) extra.declaredType = meta.declaredType;
  if (meta.docInfo !== undefined) extra.docInfo = meta.docInfo;
  return Object.freeze<N>({ ...node, ...extra });
}

/** 以新的位置替换节点位置，返回新的冻结节点 */
export function reposition<N extends AST.Node>(node: N, position: AST.Position | null): N {
  return Object.freeze<N>({ ...node, position });
}

/**
 * 子节点草稿：构建期间收集子节点，close 时交给构造器生成冻结节点。
 * 草稿只在构建器内部使用。
 */
export class NodeDraft {
  private readonly collected: AST.Node[] = [];

  add(child: AST.Node | null | undefined): this {
    if (child) this.collected.push(child);
    return this;
  }

  close<N extends AST.Node>(build: (children: readonly AST.Node[]) => N, meta: NodeMeta = {}): N {
    return closeNode(build(this.collected), meta);
  }
}
