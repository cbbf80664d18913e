/**
 * 语言配置文件加载器
 *
 * 读取 jsir.config.json，按 jsir.config.schema.json 验证后与默认配置合并。
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import { Diagnostics, dummyPosition, type Diagnostic } from '../diagnostics/diagnostics.js';
import {
  createLanguageConfig,
  isLanguageMode,
  isRecoveryMode,
  isStrictModePolicy,
  type LanguageConfig,
} from './language-config.js';

const Ajv = AjvModule.default;

// schema 位于项目根目录；构建时复制到 dist/ 下，相对层级不变
const __dirname = dirname(fileURLToPath(import.meta.url));
const schemaPath = join(__dirname, '..', '..', 'jsir.config.schema.json');

let compiled: ValidateFunction | null = null;

function schemaValidator(): ValidateFunction {
  if (compiled === null) {
    const schema = JSON.parse(readFileSync(schemaPath, 'utf-8'));
    compiled = new Ajv({ strict: true, allErrors: true }).compile(schema);
  }
  return compiled;
}

function describeAjvError(error: ErrorObject): string {
  const field = error.instancePath || '/';
  switch (error.keyword) {
    case 'additionalProperties': {
      const extra: unknown = error.params.additionalProperty;
      return `未知配置项：${String(extra)}`;
    }
    case 'enum': {
      const allowed: unknown = error.params.allowedValues;
      return `${field} 的取值无效（可选值：${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}）`;
    }
    default:
      return `${field} ${error.message ?? '不符合 schema'}`;
  }
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanField(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key];
  return typeof value === 'boolean' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 验证已解析的 JSON 值并转换为语言配置。
 *
 * @param overrides 调用方显式给出的值，优先于文件内容
 */
export function languageConfigFromJson(
  value: unknown,
  overrides: Partial<LanguageConfig> = {}
): LanguageConfig | Diagnostic[] {
  const validate = schemaValidator();
  if (!validate(value) || !isRecord(value)) {
    const errors = validate.errors ?? [];
    if (errors.length === 0) {
      return [Diagnostics.configSchemaViolation('配置文件必须是 JSON 对象', dummyPosition()).build()];
    }
    return errors.map(error => Diagnostics.configSchemaViolation(describeAjvError(error), dummyPosition()).build());
  }

  const mode = stringField(value, 'mode');
  const strictMode = stringField(value, 'strictMode');
  const recovery = stringField(value, 'recovery');
  const recordComments = booleanField(value, 'recordComments');
  const recordLocalJsDoc = booleanField(value, 'recordLocalJsDoc');
  const sourceName = stringField(value, 'sourceName');

  const fromFile: Partial<LanguageConfig> = {
    ...(mode !== undefined && isLanguageMode(mode) ? { mode } : {}),
    ...(strictMode !== undefined && isStrictModePolicy(strictMode) ? { strictMode } : {}),
    ...(recovery !== undefined && isRecoveryMode(recovery) ? { recovery } : {}),
    ...(recordComments !== undefined ? { recordComments } : {}),
    ...(recordLocalJsDoc !== undefined ? { recordLocalJsDoc } : {}),
    ...(sourceName !== undefined ? { sourceName } : {}),
  };
  return createLanguageConfig({ ...fromFile, ...overrides });
}

/**
 * 读取并验证语言配置文件。
 *
 * @returns 合并后的配置，或 C001（读取/JSON 错误）、C002（schema 违例）诊断
 */
export function loadLanguageConfig(
  filePath: string,
  overrides: Partial<LanguageConfig> = {}
): LanguageConfig | Diagnostic[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [Diagnostics.configReadError(`读取配置文件失败：${message}`, dummyPosition()).withSource(filePath).build()];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [Diagnostics.configReadError(`JSON解析失败：${message}`, dummyPosition()).withSource(filePath).build()];
  }

  const result = languageConfigFromJson(parsed, overrides);
  if (Array.isArray(result)) {
    return result.map(diagnostic => ({ ...diagnostic, sourceName: filePath }));
  }
  return result;
}

export function isLanguageConfig(result: LanguageConfig | Diagnostic[]): result is LanguageConfig {
  return !Array.isArray(result);
}
