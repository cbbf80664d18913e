/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 诊断目录 (Diagnostics)
 * - 收集器 (DiagnosticsCollector, ParseAbortedError)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
  dummyPosition,
  type Diagnostic,
  type UpdateOperation,
} from './diagnostics.js';

export { DiagnosticsCollector, ParseAbortedError } from './collector.js';
