/**
 * @module jsdoc-attacher
 *
 * 文档注释归属：按先序遍历，由第一个前导 trivia 中含有未认领 `/**` 注释的结构认领它。
 *
 * - 一段 trivia 中有多条文档注释时取最后一条
 * - 带 @fileoverview / @license / @preserve 的注释不被结构认领，留给脚本根节点
 * - 每条注释只解析一次，解析结果缓存，诊断不会重复
 */

import type ts from 'typescript';
import type { CommentRange } from '../cst/cst.js';
import type { DiagnosticsCollector } from '../diagnostics/collector.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import {
  hasAnnotations,
  hasSuspiciousAnnotation,
  isFileLevelDoc,
  parseInlineTypeDoc,
  parseJsDocComment,
  type JsDocParseContext,
} from '../jsdoc/jsdoc-parser.js';
import type { Comment, DocInfo } from '../types.js';
import type { LineMap } from './position.js';

export interface ClaimedDoc {
  readonly comment: Comment;
  readonly info: DocInfo;
}

export class JsDocAttacher {
  private readonly comments: readonly Comment[];
  private readonly claimed = new Set<number>();
  private readonly parsed = new Map<number, DocInfo>();
  private readonly parseContext: JsDocParseContext;

  constructor(
    ranges: readonly CommentRange[],
    private readonly sourceFile: ts.SourceFile,
    lineMap: LineMap,
    diagnostics: DiagnosticsCollector,
    readonly enabled: boolean
  ) {
    this.comments = ranges.map(range => ({
      kind: range.kind,
      text: range.text,
      position: lineMap.positionOf(range.start, range.end),
    }));
    this.parseContext = { lineMap, diagnostics };
  }

  /** 全部注释（按源码顺序） */
  get all(): readonly Comment[] {
    return this.comments;
  }

  /** 对形似文档注释的普通块注释发出警告 */
  reportSuspiciousComments(): void {
    if (!this.enabled) return;
    for (const comment of this.comments) {
      if (comment.kind === 'block' && hasSuspiciousAnnotation(comment.text)) {
        this.parseContext.diagnostics.emit(Diagnostics.suspiciousComment(comment.position));
      }
    }
  }

  /** 结构节点认领其前导 trivia 中最后一条未认领的文档注释 */
  claim(node: ts.Node): ClaimedDoc | null {
    const comment = this.candidate(node);
    if (comment === null) return null;
    const info = this.parse(comment);
    if (isFileLevelDoc(info)) return null;
    this.claimed.add(comment.position.offset);
    return { comment, info };
  }

  /**
   * 名称位置（参数、变量名、函数名）的注释：不含标签时按内联类型解析。
   */
  claimInline(node: ts.Node): ClaimedDoc | null {
    const comment = this.candidate(node);
    if (comment === null) return null;
    if (hasAnnotations(comment.text)) return this.claim(node);
    this.claimed.add(comment.position.offset);
    const info = parseInlineTypeDoc(comment, this.parseContext);
    this.parsed.set(comment.position.offset, info);
    return { comment, info };
  }

  /**
   * 未被认领的文件级文档注释：取最后一条 @fileoverview，
   * 并沿用之前出现的 license 文本。
   */
  fileOverview(): DocInfo | null {
    let overview: DocInfo | null = null;
    let license: string | null = null;
    for (const comment of this.unclaimed()) {
      const info = this.parse(comment);
      if (info.license !== null) license = info.license;
      if (isFileLevelDoc(info)) overview = info;
    }
    if (overview === null) return null;
    return overview.license === null && license !== null ? Object.freeze({ ...overview, license }) : overview;
  }

  /** 未被认领的文档注释；结束时调用，保证每条注释都被解析过 */
  unclaimed(): Comment[] {
    if (!this.enabled) return [];
    return this.comments.filter(c => c.kind === 'jsdoc' && !this.claimed.has(c.position.offset));
  }

  private candidate(node: ts.Node): Comment | null {
    if (!this.enabled) return null;
    const from = node.pos;
    const to = node.getStart(this.sourceFile);
    let found: Comment | null = null;
    for (let i = this.lowerBound(from); i < this.comments.length; i++) {
      const comment = this.comments[i];
      if (comment === undefined || comment.position.offset >= to) break;
      if (comment.kind === 'jsdoc') found = comment;
    }
    if (found === null || this.claimed.has(found.position.offset)) return null;
    return found;
  }

  private parse(comment: Comment): DocInfo {
    const cached = this.parsed.get(comment.position.offset);
    if (cached !== undefined) return cached;
    const info = parseJsDocComment(comment, this.parseContext);
    this.parsed.set(comment.position.offset, info);
    return info;
  }

  private lowerBound(offset: number): number {
    let lo = 0;
    let hi = this.comments.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const comment = this.comments[mid];
      if (comment !== undefined && comment.position.offset < offset) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
