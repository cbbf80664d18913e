/**
 * @module validation
 *
 * 构建完成后的整树校验（先序）：
 * - 文档注释位置：`@type` 类注解与函数类注解必须落在可接受的节点上
 * - 重复参数名（警告，位于 ParamList）
 * - break / continue / return 的上下文与标签
 * - 嵌套的重复标签
 */

import { walk } from '../ast/ast_visitor.js';
import { Diagnostics, dummyPosition } from '../diagnostics/diagnostics.js';
import type { DocInfo, Node, NodeKind, Position } from '../types.js';
import type { BuilderContext } from './context.js';

type Validator = Pick<BuilderContext, 'report' | 'casts'>;

const BREAK_TARGETS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'For',
  'ForIn',
  'ForOf',
  'ForAwaitOf',
  'While',
  'Do',
  'Switch',
]);

const CONTINUE_TARGETS: ReadonlySet<NodeKind> = new Set<NodeKind>(['For', 'ForIn', 'ForOf', 'ForAwaitOf', 'While', 'Do']);

/** 可以携带 `@type` 的名称所在的父节点 */
const TYPED_NAME_PARENTS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'StringKey',
  'GetterDef',
  'SetterDef',
  'Catch',
  'Function',
  'Var',
  'Let',
  'Const',
  'ParamList',
  'DefaultValue',
  'Rest',
]);

/** 可以携带函数类注解（@param、@return …）的节点 */
const FUNCTION_DOC_HOLDERS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'Function',
  'Var',
  'Let',
  'Const',
  'GetterDef',
  'SetterDef',
  'MemberFunctionDef',
  'StringKey',
  'ComputedProp',
  'Class',
  'Assign',
]);

function at(node: Node): Position {
  return node.position ?? dummyPosition();
}

function isQualifiedName(node: Node | undefined): boolean {
  if (node === undefined) return false;
  switch (node.kind) {
    case 'Name':
      return node.value !== '';
    case 'This':
      return true;
    case 'GetProp':
      return isQualifiedName(node.children[0]);
    default:
      return false;
  }
}

function declaresFunction(doc: DocInfo): boolean {
  if (doc.type !== null) return false;
  return (
    doc.returnType !== null ||
    doc.thisType !== null ||
    doc.params.length > 0 ||
    doc.flags.isConstructor ||
    doc.flags.noSideEffects
  );
}

function typeAnnotationAllowed(node: Node, parent: Node | null, doc: DocInfo, casts: ReadonlySet<Node>): boolean {
  if (casts.has(node)) return true;
  switch (node.kind) {
    case 'Var':
    case 'Let':
    case 'Const':
    case 'StringKey':
    case 'GetterDef':
    case 'SetterDef':
    case 'MemberFieldDef':
      return true;
    case 'Function':
      return node.declaration;
    case 'Name':
    case 'DefaultValue':
      return parent !== null && TYPED_NAME_PARENTS.has(parent.kind);
    case 'Assign': {
      const target = node.children[0];
      return parent?.kind === 'ExprResult' && (target.kind === 'GetProp' || target.kind === 'GetElem');
    }
    case 'GetProp':
      return parent?.kind === 'ExprResult' && isQualifiedName(node);
    case 'Call':
      return doc.flags.define;
    default:
      return false;
  }
}

function functionDocAllowed(node: Node): boolean {
  if (FUNCTION_DOC_HOLDERS.has(node.kind)) return true;
  if (node.kind === 'GetProp' || node.kind === 'GetElem') return isQualifiedName(node.children[0]);
  return false;
}

function validateDoc(validator: Validator, node: Node, parent: Node | null): void {
  const doc = node.docInfo;
  if (doc === undefined) return;
  if (doc.type !== null && !typeAnnotationAllowed(node, parent, doc, validator.casts)) {
    validator.report(Diagnostics.misplacedTypeAnnotation(at(node)));
  }
  if (declaresFunction(doc) && !functionDocAllowed(node)) {
    validator.report(Diagnostics.misplacedFunctionAnnotation(at(node)));
  }
}

function validateParameters(validator: Validator, node: Node): void {
  if (node.kind !== 'ParamList') return;
  node.children.forEach((param, index) => {
    if (param.kind !== 'Name') return;
    for (const sibling of node.children.slice(index + 1)) {
      if (sibling.kind === 'Name' && sibling.value === param.value) {
        validator.report(Diagnostics.duplicateParameter(param.value, at(node)));
      }
    }
  });
}

function labelOf(node: Node): string | null {
  const first = node.children[0];
  return first?.kind === 'LabelName' ? first.value : null;
}

/** 由近到远的祖先，遇到函数或脚本根为止（含该节点） */
function* enclosing(ancestors: readonly Node[]): Generator<Node> {
  for (let i = ancestors.length - 1; i >= 0; i--) {
    const ancestor = ancestors[i];
    if (ancestor === undefined) continue;
    yield ancestor;
    if (ancestor.kind === 'Function' || ancestor.kind === 'Script') return;
  }
}

function validateJump(validator: Validator, node: Node, ancestors: readonly Node[]): void {
  if (node.kind !== 'Break' && node.kind !== 'Continue') return;
  const label = labelOf(node);

  if (label !== null) {
    for (const ancestor of enclosing(ancestors)) {
      if (ancestor.kind !== 'Label' || labelOf(ancestor) !== label) continue;
      const statement = ancestor.children[ancestor.children.length - 1];
      if (node.kind === 'Continue' && (statement === undefined || !CONTINUE_TARGETS.has(statement.kind))) {
        validator.report(Diagnostics.unexpectedLabeledContinue(at(node)));
      }
      return;
    }
    validator.report(Diagnostics.undefinedLabel(label, at(node)));
    return;
  }

  const targets = node.kind === 'Break' ? BREAK_TARGETS : CONTINUE_TARGETS;
  for (const ancestor of enclosing(ancestors)) {
    if (targets.has(ancestor.kind)) return;
  }
  validator.report(node.kind === 'Break' ? Diagnostics.unlabeledBreak(at(node)) : Diagnostics.unexpectedContinue(at(node)));
}

function validateReturn(validator: Validator, node: Node, ancestors: readonly Node[]): void {
  if (node.kind !== 'Return') return;
  if (ancestors.some(ancestor => ancestor.kind === 'Function')) return;
  validator.report(Diagnostics.unexpectedReturn(at(node)));
}

function validateLabel(validator: Validator, node: Node, ancestors: readonly Node[]): void {
  if (node.kind !== 'Label') return;
  const label = labelOf(node);
  for (let i = ancestors.length - 1; i >= 0; i--) {
    const ancestor = ancestors[i];
    if (ancestor === undefined || ancestor.kind === 'Function') return;
    if (ancestor.kind === 'Label' && labelOf(ancestor) === label && label !== null) {
      validator.report(Diagnostics.duplicateLabel(label, at(node)));
      return;
    }
  }
}

export function validateTree(validator: Validator, root: Node): void {
  const ancestors: Node[] = [];
  walk(
    root,
    {
      enter: (node, parent) => {
        validateDoc(validator, node, parent);
        validateParameters(validator, node);
        validateJump(validator, node, ancestors);
        validateReturn(validator, node, ancestors);
        validateLabel(validator, node, ancestors);
        ancestors.push(node);
      },
      leave: () => {
        ancestors.pop();
      },
    },
    undefined
  );
}
