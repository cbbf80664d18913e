/**
 * @module language-config
 *
 * 单次构建的语言配置。显式传入 build()/parse()，不读取进程环境。
 */

export type LanguageMode = 'ES3' | 'ES5' | 'ES6' | 'ES6_TYPED' | 'ES_NEXT';

export const LANGUAGE_MODES: readonly LanguageMode[] = ['ES3', 'ES5', 'ES6', 'ES6_TYPED', 'ES_NEXT'];

/**
 * - `sloppy`：仅在 "use strict" 指令下为严格代码
 * - `strict`：所有作用域均为严格代码
 * - `implicit-strict`：同 strict，但不要求指令（指令仍会被记录）
 */
export type StrictModePolicy = 'sloppy' | 'strict' | 'implicit-strict';

export const STRICT_MODE_POLICIES: readonly StrictModePolicy[] = ['sloppy', 'strict', 'implicit-strict'];

export type RecoveryMode = 'stop-on-first-error' | 'keep-going';

export const RECOVERY_MODES: readonly RecoveryMode[] = ['stop-on-first-error', 'keep-going'];

export interface LanguageConfig {
  readonly mode: LanguageMode;
  readonly strictMode: StrictModePolicy;
  readonly recovery: RecoveryMode;
  /** 收集全部注释并处理文档注释 */
  readonly recordComments: boolean;
  /** 为函数体内部的声明附加文档注释 */
  readonly recordLocalJsDoc: boolean;
  /** 诊断与节点上记录的源文件名 */
  readonly sourceName: string;
}

export const DEFAULT_LANGUAGE_CONFIG: LanguageConfig = Object.freeze({
  mode: 'ES_NEXT',
  strictMode: 'sloppy',
  recovery: 'keep-going',
  recordComments: true,
  recordLocalJsDoc: true,
  sourceName: 'input.js',
});

export function createLanguageConfig(partial: Partial<LanguageConfig> = {}): LanguageConfig {
  return Object.freeze({ ...DEFAULT_LANGUAGE_CONFIG, ...partial });
}

const MODE_RANK: Readonly<Record<LanguageMode, number>> = {
  ES3: 0,
  ES5: 1,
  ES6: 2,
  ES6_TYPED: 2,
  ES_NEXT: 3,
};

/** 模式是否包含 ES6 特性（ES6、ES6_TYPED、ES_NEXT） */
export function supportsEs6(mode: LanguageMode): boolean {
  return MODE_RANK[mode] >= MODE_RANK.ES6;
}

export function supportsEsNext(mode: LanguageMode): boolean {
  return mode === 'ES_NEXT';
}

export function supportsTypeSyntax(mode: LanguageMode): boolean {
  return mode === 'ES6_TYPED';
}

export function isLanguageMode(value: string): value is LanguageMode {
  return LANGUAGE_MODES.some(mode => mode === value);
}

export function isStrictModePolicy(value: string): value is StrictModePolicy {
  return STRICT_MODE_POLICIES.some(policy => policy === value);
}

export function isRecoveryMode(value: string): value is RecoveryMode {
  return RECOVERY_MODES.some(mode => mode === value);
}
