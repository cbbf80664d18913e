import ts from 'typescript';
import type { NodeFrame } from '../ast/ast.js';
import { ConfigService } from '../config/config-service.js';
import { supportsEs6, supportsEsNext, type LanguageConfig } from '../config/language-config.js';
import type { ConcreteTree } from '../cst/cst.js';
import type { DiagnosticsCollector } from '../diagnostics/collector.js';
import { Diagnostics, type DiagnosticBuilder } from '../diagnostics/diagnostics.js';
import type { DocInfo, Node, Position } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { Es6FeatureName, EsNextFeatureName } from './es-features.js';
import { JsDocAttacher } from './jsdoc-attacher.js';
import { LineMap, skipTrivia } from './position.js';

/** 词法作用域状态：严格模式与函数嵌套 */
export interface ScopeState {
  readonly strict: boolean;
  /** 函数嵌套深度，0 表示脚本顶层 */
  readonly functionDepth: number;
}

/**
 * 构建器上下文：一次构建共享的只读输入与可变状态。
 */
export interface BuilderContext {
  readonly text: string;
  readonly root: ts.SourceFile;
  readonly typed: boolean;
  readonly lineMap: LineMap;
  readonly config: LanguageConfig;
  readonly diagnostics: DiagnosticsCollector;
  readonly docs: JsDocAttacher;
  /** 作为类型转换（带类型的括号表达式）附加了文档的节点 */
  readonly casts: Set<Node>;
  scope: ScopeState;
  /** ts 节点的源码位置（不含前导 trivia） */
  span(node: ts.Node): Position;
  range(start: number, end: number): Position;
  /** 从 offset 起跳过空白与注释后的首个字符偏移 */
  skipTrivia(offset: number): number;
  frame(position: Position | null): NodeFrame;
  frameOf(node: ts.Node): NodeFrame;
  report(diagnostic: DiagnosticBuilder): void;
  /** 结构节点认领前导文档注释；函数体内且不记录局部文档时不认领 */
  claim(node: ts.Node): DocInfo | null;
  /** 名称位置的文档注释，无标签时按内联类型解析 */
  claimInline(node: ts.Node): DocInfo | null;
  es6(feature: Es6FeatureName, node: ts.Node): void;
  esNext(feature: EsNextFeatureName, node: ts.Node): void;
  isStrict(): boolean;
  withScope<T>(scope: Partial<ScopeState>, body: () => T): T;
  trace(message: string, node: ts.Node): void;
}

const builderLogger = createLogger('builder');

export function createBuilderContext(
  tree: ConcreteTree,
  config: LanguageConfig,
  diagnostics: DiagnosticsCollector
): BuilderContext {
  const lineMap = new LineMap(tree.text);
  const debug = ConfigService.getInstance().debugBuilder;
  const localDocsSkipped = (): boolean => !config.recordLocalJsDoc && ctx.scope.functionDepth > 0;

  const ctx: BuilderContext = {
    text: tree.text,
    root: tree.root,
    typed: tree.typed,
    lineMap,
    config,
    diagnostics,
    docs: new JsDocAttacher(tree.comments, tree.root, lineMap, diagnostics, config.recordComments),
    casts: new Set<Node>(),
    scope: { strict: config.strictMode !== 'sloppy', functionDepth: 0 },
    span: (node: ts.Node): Position => lineMap.positionOf(node.getStart(tree.root), node.end),
    range: (start: number, end: number): Position => lineMap.positionOf(start, end),
    skipTrivia: (offset: number): number => skipTrivia(tree.text, offset),
    frame: (position: Position | null): NodeFrame => ({ position, sourceFile: config.sourceName }),
    frameOf: (node: ts.Node): NodeFrame => ctx.frame(ctx.span(node)),
    report: (diagnostic: DiagnosticBuilder): void => diagnostics.emit(diagnostic),
    claim: (node: ts.Node): DocInfo | null => (localDocsSkipped() ? null : (ctx.docs.claim(node)?.info ?? null)),
    claimInline: (node: ts.Node): DocInfo | null =>
      localDocsSkipped() ? null : (ctx.docs.claimInline(node)?.info ?? null),
    es6: (feature: Es6FeatureName, node: ts.Node): void => {
      if (!supportsEs6(config.mode)) ctx.report(Diagnostics.es6Feature(feature, ctx.span(node)));
    },
    esNext: (feature: EsNextFeatureName, node: ts.Node): void => {
      if (!supportsEsNext(config.mode)) ctx.report(Diagnostics.esNextFeature(feature, ctx.span(node)));
    },
    isStrict: (): boolean => ctx.scope.strict,
    withScope: <T>(scope: Partial<ScopeState>, body: () => T): T => {
      const saved = ctx.scope;
      ctx.scope = { ...saved, ...scope };
      try {
        return body();
      } finally {
        ctx.scope = saved;
      }
    },
    trace: (message: string, node: ts.Node): void => {
      if (!debug) return;
      builderLogger.debug(message, {
        kind: ts.SyntaxKind[node.kind],
        offset: node.getStart(tree.root),
        depth: ctx.scope.functionDepth,
      });
    },
  };

  return ctx;
}
