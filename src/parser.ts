/**
 * jsir 解析器 - 主入口
 *
 * 源码 → 具体语法树（TypeScript 编译器 API）→ AST。
 * 具体语法分析器的语法错误与构建器的诊断记录在同一个收集器中。
 */

import { createLanguageConfig, supportsTypeSyntax, type LanguageConfig } from './config/language-config.js';
import { parseConcreteTree } from './cst/cst_builder.js';
import { DiagnosticsCollector, ParseAbortedError } from './diagnostics/collector.js';
import { Diagnostics, type Diagnostic } from './diagnostics/diagnostics.js';
import { build } from './parser/builder.js';
import { LineMap } from './parser/position.js';
import type { ScriptNode } from './types.js';

export type ParseOptions = Partial<LanguageConfig>;

/**
 * 解析结果
 *
 * stop-on-first-error 模式下遇到错误时 root 为 null，不暴露部分构建的树。
 */
export interface ParseResult {
  root: ScriptNode | null;
  diagnostics: readonly Diagnostic[];
}

export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const config = createLanguageConfig(options);
  const diagnostics = new DiagnosticsCollector(config.recovery, config.sourceName);

  try {
    const tree = parseConcreteTree(source, { typed: supportsTypeSyntax(config.mode) });
    const lineMap = new LineMap(source);
    for (const error of tree.syntaxErrors) {
      diagnostics.emit(Diagnostics.syntaxError(error.message, lineMap.positionOf(error.start, error.start + error.length)));
    }
    return { root: build(tree, source, config, diagnostics), diagnostics: diagnostics.all };
  } catch (error) {
    if (error instanceof ParseAbortedError) return { root: null, diagnostics: diagnostics.all };
    throw error;
  }
}
