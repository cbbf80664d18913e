/**
 * @module jsir-frontend
 *
 * JavaScript 编译器前端的主要 API 接口：源码 → 带位置与文档注释信息的冻结 AST。
 *
 * **构建管道**：
 * ```
 * 源码 → 具体语法树（TypeScript 编译器 API）→ build → Script AST → 整树校验
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { parse, printCode, toStringTree } from 'jsir-frontend';
 *
 * const { root, diagnostics } = parse(`var x = 1;`, { mode: 'ES5' });
 * if (root) {
 *   console.log(toStringTree(root));
 *   console.log(printCode(root));
 * }
 * console.log(diagnostics.length);
 * ```
 */

// 构建管道
export { parse } from './parser.js';
export type { ParseOptions, ParseResult } from './parser.js';
export { build } from './parser/builder.js';
export { parseConcreteTree } from './cst/index.js';
export type { ConcreteTree, CommentRange, ConcreteSyntaxError } from './cst/index.js';

// 语言配置
export {
  DEFAULT_LANGUAGE_CONFIG,
  createLanguageConfig,
  supportsEs6,
  supportsEsNext,
  supportsTypeSyntax,
} from './config/language-config.js';
export type { LanguageConfig, LanguageMode, StrictModePolicy, RecoveryMode } from './config/language-config.js';
export { loadLanguageConfig, languageConfigFromJson, isLanguageConfig } from './config/config-loader.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  Diagnostics,
  DiagnosticsCollector,
  ParseAbortedError,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics/index.js';

// AST 构造、遍历与打印
export {
  Node,
  NodeDraft,
  closeNode,
  reposition,
  DefaultAstVisitor,
  walk,
  nextSibling,
  countNodes,
  describePayload,
  typeToString,
  toStringTree,
  isEquivalentTo,
} from './ast/index.js';
export type { AstVisitor, NodeFrame } from './ast/index.js';
export { printCode, quoteString, typeToTypeScript } from './printer/code-printer.js';

// 独立可用的构建组件
export { LineMap } from './parser/position.js';
export { validateTarget, validateDeleteOperand } from './parser/target-validator.js';
export type { TargetOperation, TargetVerdict } from './parser/target-validator.js';
export { collectPatternNames, patternNames } from './parser/pattern-names.js';
export { JsDocTokenStream, JsDocTokenKind, type JsDocToken } from './jsdoc/index.js';

// 类型定义重导出
export type * from './types.js';
