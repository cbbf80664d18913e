#!/usr/bin/env node
import fs from 'node:fs';
import { cac } from 'cac';
import { toStringTree } from '../src/ast/ast_visitor.js';
import { isLanguageConfig, loadLanguageConfig } from '../src/config/config-loader.js';
import { createLanguageConfig, isLanguageMode, type LanguageConfig } from '../src/config/language-config.js';
import { DiagnosticSeverity, type Diagnostic } from '../src/diagnostics/diagnostics.js';
import { parse, type ParseResult } from '../src/parser.js';
import { printCode } from '../src/printer/code-printer.js';
import {
  EXIT_DIAGNOSTICS,
  createDiagnosticsError,
  handleError,
  printDiagnostics,
} from '../src/cli/utils/error-handler.js';
import { output, success } from '../src/cli/utils/logger.js';

interface CommonOptions {
  mode?: string;
  strict?: boolean;
  stopOnFirstError?: boolean;
  config?: string;
  json?: boolean;
}

function readFileStrict(file: string): string {
  return fs.readFileSync(file, 'utf8');
}

function resolveConfig(file: string, options: CommonOptions): LanguageConfig {
  const mode = options.mode;
  if (mode !== undefined && !isLanguageMode(mode)) {
    throw new Error(`未知的语言模式：${mode}（可选值：ES3, ES5, ES6, ES6_TYPED, ES_NEXT）`);
  }
  const overrides: Partial<LanguageConfig> = {
    sourceName: file,
    ...(mode !== undefined ? { mode } : {}),
    ...(options.strict ? { strictMode: 'strict' as const } : {}),
    ...(options.stopOnFirstError ? { recovery: 'stop-on-first-error' as const } : {}),
  };
  if (options.config === undefined) return createLanguageConfig(overrides);
  const loaded = loadLanguageConfig(options.config, overrides);
  if (!isLanguageConfig(loaded)) throw createDiagnosticsError(loaded);
  return loaded;
}

function run(file: string, options: CommonOptions): { source: string; result: ParseResult } {
  const source = readFileStrict(file);
  return { source, result: parse(source, resolveConfig(file, options)) };
}

// 指令集合输出为数组
function jsonReplacer(_key: string, value: unknown): unknown {
  return value instanceof Set ? [...value] : value;
}

function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === DiagnosticSeverity.Error);
}

function cmdParse(file: string, options: CommonOptions): void {
  const { source, result } = run(file, options);
  if (options.json) {
    output(JSON.stringify({ root: result.root, diagnostics: result.diagnostics }, jsonReplacer, 2));
  } else {
    printDiagnostics(result.diagnostics, source);
    if (result.root) output(toStringTree(result.root));
  }
  if (hasErrors(result.diagnostics)) process.exitCode = EXIT_DIAGNOSTICS;
}

function cmdPrint(file: string, options: CommonOptions): void {
  const { source, result } = run(file, options);
  printDiagnostics(result.diagnostics, source);
  if (result.root === null || hasErrors(result.diagnostics)) {
    process.exitCode = EXIT_DIAGNOSTICS;
    return;
  }
  output(printCode(result.root));
}

function cmdCheck(file: string, options: CommonOptions): void {
  const { source, result } = run(file, options);
  if (options.json) {
    output(JSON.stringify(result.diagnostics, null, 2));
  } else {
    printDiagnostics(result.diagnostics, source);
  }
  if (hasErrors(result.diagnostics)) {
    process.exitCode = EXIT_DIAGNOSTICS;
  } else if (!options.json) {
    success(`${file}：未发现错误`);
  }
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function withCommonOptions<T extends { option: (raw: string, description: string) => T }>(command: T): T {
  return command
    .option('--mode <mode>', '语言模式（ES3、ES5、ES6、ES6_TYPED、ES_NEXT）')
    .option('--strict', '将所有代码视为严格模式代码')
    .option('--stop-on-first-error', '遇到第一个错误即停止')
    .option('--config <file>', '语言配置文件（jsir.config.json）');
}

async function main(): Promise<void> {
  const cli = cac('jsir');

  withCommonOptions(cli.command('parse <file>', '解析 JavaScript 文件并输出 AST'))
    .option('--json', '以 JSON 格式输出')
    .action(wrapAction((file: string, options: CommonOptions) => cmdParse(file, options)));

  withCommonOptions(cli.command('print <file>', '解析后重新打印源码'))
    .action(wrapAction((file: string, options: CommonOptions) => cmdPrint(file, options)));

  withCommonOptions(cli.command('check <file>', '只输出诊断，存在错误时退出码为 1'))
    .option('--json', '以 JSON 格式输出诊断')
    .action(wrapAction((file: string, options: CommonOptions) => cmdCheck(file, options)));

  cli.help();
  cli.parse();
}

main().catch(handleError);
