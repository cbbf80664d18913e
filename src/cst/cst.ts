import type ts from 'typescript';

/** 具体语法树中的注释区间（绝对偏移，end 不含） */
export interface CommentRange {
  readonly kind: 'line' | 'block' | 'jsdoc';
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** 具体语法分析器报告的语法错误 */
export interface ConcreteSyntaxError {
  readonly message: string;
  readonly start: number;
  readonly length: number;
}

/**
 * 具体语法树：外部语法分析器的产物，加上按源码顺序排列的全部注释。
 *
 * 构建器只读取它，不修改。
 */
export interface ConcreteTree {
  readonly text: string;
  /** 是否按带类型语法（ES6_TYPED）解析 */
  readonly typed: boolean;
  readonly root: ts.SourceFile;
  readonly comments: readonly CommentRange[];
  readonly syntaxErrors: readonly ConcreteSyntaxError[];
}

export interface ConcreteParseOptions {
  readonly typed: boolean;
}
