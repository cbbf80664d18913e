import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = ['LOG_LEVEL', 'JSIR_DEBUG_BUILDER'];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

describe('ConfigService', () => {
  afterEach(() => {
    restoreEnv();
    ConfigService.resetForTesting();
  });

  it('未设置环境变量时使用默认值', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.JSIR_DEBUG_BUILDER;
    ConfigService.resetForTesting();
    const config = ConfigService.getInstance();
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.debugBuilder, false);
  });

  it('读取 LOG_LEVEL（不区分大小写）', () => {
    process.env.LOG_LEVEL = 'debug';
    ConfigService.resetForTesting();
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.DEBUG);
  });

  it('未知日志级别回退到 INFO', () => {
    assert.equal(ConfigService.parseLogLevel('verbose'), LogLevel.INFO);
    assert.equal(ConfigService.parseLogLevel('WARN'), LogLevel.WARN);
    assert.equal(ConfigService.parseLogLevel(undefined), LogLevel.INFO);
  });

  it('JSIR_DEBUG_BUILDER=1 启用构建器跟踪', () => {
    process.env.JSIR_DEBUG_BUILDER = '1';
    ConfigService.resetForTesting();
    assert.equal(ConfigService.getInstance().debugBuilder, true);
  });

  it('单例在重置前保持不变', () => {
    ConfigService.resetForTesting();
    const first = ConfigService.getInstance();
    process.env.LOG_LEVEL = 'ERROR';
    assert.equal(ConfigService.getInstance(), first);
    ConfigService.resetForTesting();
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.ERROR);
  });
});
