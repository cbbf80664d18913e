/**
 * @module builder
 *
 * AST 构建入口：具体语法树 → 冻结的 Script 树。
 *
 * 构建顺序：
 * 1. 指令序言与严格模式（模块代码总是严格的）
 * 2. 语句逐条构建，诊断写入收集器
 * 3. 文件级文档注释与可疑块注释
 * 4. 整树校验
 */

import ts from 'typescript';
import { Node } from '../ast/ast.js';
import { countNodes } from '../ast/ast_visitor.js';
import type { LanguageConfig } from '../config/language-config.js';
import type { ConcreteTree } from '../cst/cst.js';
import type { DiagnosticsCollector } from '../diagnostics/collector.js';
import type { ScriptNode } from '../types.js';
import { createLogger, timed } from '../utils/logger.js';
import { withDoc } from './build-utils.js';
import { createBuilderContext } from './context.js';
import { buildStatements, splitPrologue } from './stmt-builder.js';
import { validateTree } from './validation.js';

const logger = createLogger('builder');

/**
 * 构建 Script 根节点。
 *
 * 只会抛出 ParseAbortedError（stop-on-first-error 模式下的首个错误），
 * 或在具体语法树与源码不一致时抛出 TypeError。
 */
export function build(
  tree: ConcreteTree,
  source: string,
  config: LanguageConfig,
  diagnostics: DiagnosticsCollector
): ScriptNode {
  if (tree.text !== source) {
    throw new TypeError(`concrete tree does not belong to source ${config.sourceName}`);
  }

  return timed(
    'builder',
    'build',
    () => {
      logger.debug('build started', { source: config.sourceName, mode: config.mode, length: source.length });
      const ctx = createBuilderContext(tree, config, diagnostics);
      const prologue = splitPrologue(tree.root.statements);
      const strict =
        config.strictMode !== 'sloppy' ||
        ts.isExternalModule(tree.root) ||
        (prologue.directives?.has('use strict') ?? false);

      const statements = ctx.withScope({ strict }, () => buildStatements(ctx, prologue.body));
      const comments = config.recordComments ? ctx.docs.all : [];
      const script = Node.script(statements, prologue.directives, comments, ctx.frame(ctx.range(0, source.length)));

      ctx.docs.reportSuspiciousComments();
      const root = withDoc(script, ctx.docs.fileOverview());
      validateTree(ctx, root);

      logger.debug('build finished', {
        source: config.sourceName,
        nodes: countNodes(root),
        diagnostics: diagnostics.count,
      });
      return root;
    },
    { source: config.sourceName }
  );
}
