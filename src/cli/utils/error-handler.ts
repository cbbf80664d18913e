import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticError, DiagnosticSeverity, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error as logError, detail, warn as logWarn } from './logger.js';

/** 退出码：1 表示输入存在错误，2 表示命令本身无法执行 */
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_FAILURE = 2;

interface DiagnosticCarrier extends Error {
  diagnostics: readonly Diagnostic[];
}

function isDiagnostic(value: unknown): value is Diagnostic {
  return typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string';
}

function isDiagnosticCarrier(value: unknown): value is DiagnosticCarrier {
  return (
    value instanceof Error &&
    'diagnostics' in value &&
    Array.isArray(value.diagnostics) &&
    value.diagnostics.every(isDiagnostic)
  );
}

function isNodeError(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string';
}

function hintFor(diagnostic: Diagnostic): string | null {
  const code: string = diagnostic.code;
  if (code.startsWith('C00')) return '请按照 jsir.config.schema.json 修复配置文件后重试';
  if (code.startsWith('F00')) return '可以通过 --mode 选择更新的语言模式';
  return null;
}

/**
 * 逐条打印诊断；给出源码时附带出错行摘录。
 */
export function printDiagnostics(diagnostics: readonly Diagnostic[], source?: string): void {
  for (const diagnostic of diagnostics) {
    const [headline = '', ...excerpt] = formatDiagnostic(diagnostic, source).split('\n');
    if (diagnostic.severity === DiagnosticSeverity.Error) {
      logError(headline);
    } else {
      logWarn(headline);
    }
    for (const line of excerpt) detail(line);
    const hint = hintFor(diagnostic);
    if (hint) detail(`  ${hint}`);
  }
}

export function createDiagnosticsError(diagnostics: readonly Diagnostic[]): Error {
  const carrier: DiagnosticCarrier = Object.assign(new Error('CLI_DIAGNOSTIC_ERROR'), { diagnostics });
  return carrier;
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

/**
 * 将命令抛出的错误映射为输出与退出码。
 */
export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
    process.exit(EXIT_DIAGNOSTICS);
  }

  if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics);
    process.exit(EXIT_DIAGNOSTICS);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(EXIT_FAILURE);
  }

  logError(error instanceof Error ? error.message : '发生未知错误，请重试');
  process.exit(EXIT_FAILURE);
}
