import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticsCollector, ParseAbortedError } from '../../../src/diagnostics/collector.js';
import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticSeverity,
  Diagnostics,
  formatDiagnostic,
} from '../../../src/diagnostics/diagnostics.js';
import type { Position } from '../../../src/types.js';

const pos: Position = { line: 1, column: 4, length: 3, offset: 4 };

describe('诊断收集器', () => {
  it('keep-going 模式下记录全部诊断并补全来源文件名', () => {
    const collector = new DiagnosticsCollector('keep-going', 'a.js');
    collector.emit(Diagnostics.unexpectedReturn(pos));
    collector.emit(Diagnostics.duplicateParameter('x', pos));

    assert.equal(collector.count, 2);
    assert.equal(collector.errorCount, 1);
    assert.equal(collector.warningCount, 1);
    assert.equal(collector.hasErrors(), true);
    assert.equal(collector.all[0]?.sourceName, 'a.js');
    assert.equal(collector.warnings[0]?.message, 'Duplicate parameter name "x"');
  });

  it('stop-on-first-error 模式下警告不中止，错误在记录后中止', () => {
    const collector = new DiagnosticsCollector('stop-on-first-error', 'a.js');
    collector.emit(Diagnostics.es6Feature('let declaration', pos));
    assert.throws(
      () => collector.emit(Diagnostics.unlabeledBreak(pos)),
      (error: unknown) =>
        error instanceof ParseAbortedError &&
        error.diagnostic.message === 'unlabelled break must be inside loop or switch'
    );
    assert.equal(collector.count, 2);
  });

  it('record 未给出代码时按严重级别取通用代码', () => {
    const collector = new DiagnosticsCollector('keep-going');
    collector.record(DiagnosticSeverity.Error, 'bad', pos);
    collector.record(DiagnosticSeverity.Warning, 'meh', pos);
    collector.record(DiagnosticSeverity.Error, 'label', pos, DiagnosticCode.S006_DuplicateLabel);
    assert.deepEqual(
      collector.all.map(d => d.code),
      [DiagnosticCode.G001_GenericError, DiagnosticCode.G002_GenericWarning, DiagnosticCode.S006_DuplicateLabel]
    );
  });

  it('hasAll 检查每条期望消息至少出现一次', () => {
    const collector = new DiagnosticsCollector('keep-going');
    collector.emit(Diagnostics.unexpectedContinue(pos));
    assert.equal(collector.hasAll(['continue must be inside loop']), true);
    assert.equal(collector.hasAll(['continue must be inside loop', 'return must be inside function']), false);
  });
});

describe('诊断构建与格式化', () => {
  it('缺少消息时拒绝构建', () => {
    assert.throws(
      () => DiagnosticBuilder.error(DiagnosticCode.P001_SyntaxError).withPosition(pos).build(),
      /Diagnostic message is required/
    );
  });

  it('格式化时附带源码行与下划线', () => {
    const diagnostic = Diagnostics.syntaxError('boom', pos).withSource('a.js').build();
    assert.equal(
      formatDiagnostic(diagnostic, 'var x = 1;'),
      ['error P001: boom at a.js:1:4', '> 1| var x = 1;', `>${' '.repeat(8)}^^^`].join('\n')
    );
  });

  it('没有源码时只输出首行', () => {
    const diagnostic = Diagnostics.reservedWord(pos).build();
    assert.equal(formatDiagnostic(diagnostic), 'error P009: identifier is a reserved word at 1:4');
  });
});
