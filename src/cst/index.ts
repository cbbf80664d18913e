/**
 * @module cst
 *
 * CST（具体语法树）模块。
 *
 * 包含：
 * - CST 类型定义 (ConcreteTree, CommentRange, ConcreteSyntaxError)
 * - CST 构建器 (parseConcreteTree)
 */

export type { ConcreteTree, ConcreteParseOptions, CommentRange, ConcreteSyntaxError } from './cst.js';
export { parseConcreteTree } from './cst_builder.js';
