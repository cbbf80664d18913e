/**
 * @module collector
 *
 * 诊断收集器：一次构建中所有诊断的唯一去处。
 *
 * 只追加、不删除。`stop-on-first-error` 模式下，错误在追加后立即以
 * ParseAbortedError 中止构建；警告从不中止。
 */

import type { RecoveryMode } from '../config/language-config.js';
import type { Position } from '../types.js';
import {
  DiagnosticCode,
  DiagnosticError,
  DiagnosticSeverity,
  type Diagnostic,
  type DiagnosticBuilder,
} from './diagnostics.js';

export class ParseAbortedError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = 'ParseAbortedError';
  }
}

export class DiagnosticsCollector {
  private readonly entries: Diagnostic[] = [];

  constructor(
    readonly mode: RecoveryMode,
    readonly sourceName = ''
  ) {}

  /** 按严重级别与消息记录诊断；未给出代码时按严重级别取通用代码 */
  record(severity: DiagnosticSeverity, message: string, position: Position, code?: DiagnosticCode): void {
    this.report({
      severity,
      code: code ?? (severity === DiagnosticSeverity.Error ? DiagnosticCode.G001_GenericError : DiagnosticCode.G002_GenericWarning),
      message,
      position,
      sourceName: this.sourceName,
    });
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    if (this.mode === 'stop-on-first-error' && diagnostic.severity === DiagnosticSeverity.Error) {
      throw new ParseAbortedError(diagnostic);
    }
  }

  /** 补全来源文件名后记录 Diagnostics 目录中的诊断 */
  emit(builder: DiagnosticBuilder): void {
    this.report(builder.withSource(this.sourceName).build());
  }

  get count(): number {
    return this.entries.length;
  }

  get errorCount(): number {
    return this.entries.filter(d => d.severity === DiagnosticSeverity.Error).length;
  }

  get warningCount(): number {
    return this.entries.filter(d => d.severity === DiagnosticSeverity.Warning).length;
  }

  get all(): readonly Diagnostic[] {
    return this.entries;
  }

  get errors(): readonly Diagnostic[] {
    return this.entries.filter(d => d.severity === DiagnosticSeverity.Error);
  }

  get warnings(): readonly Diagnostic[] {
    return this.entries.filter(d => d.severity === DiagnosticSeverity.Warning);
  }

  /** 每条期望消息都至少出现过一次 */
  hasAll(messages: Iterable<string>): boolean {
    const seen = new Set(this.entries.map(d => d.message));
    for (const message of messages) {
      if (!seen.has(message)) return false;
    }
    return true;
  }

  hasErrors(): boolean {
    return this.entries.some(d => d.severity === DiagnosticSeverity.Error);
  }
}
