/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node, closeNode, NodeDraft)
 * - 遍历与比较工具 (walk, DefaultAstVisitor, toStringTree, isEquivalentTo)
 */

export { Node, NodeDraft, closeNode, reposition, type NodeFrame, type NodeMeta } from './ast.js';
export {
  DefaultAstVisitor,
  walk,
  nextSibling,
  countNodes,
  describePayload,
  typeToString,
  toStringTree,
  isEquivalentTo,
} from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
