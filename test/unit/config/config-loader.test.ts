import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  isLanguageConfig,
  languageConfigFromJson,
  loadLanguageConfig,
} from '../../../src/config/config-loader.js';

describe('语言配置文件', () => {
  let dir = '';

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jsir-config-test-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  it('文件中的值与默认值合并，显式覆盖优先', () => {
    const file = writeConfig('valid.json', JSON.stringify({ mode: 'ES5', recovery: 'stop-on-first-error', sourceName: 'a.js' }));
    const result = loadLanguageConfig(file, { sourceName: 'b.js' });
    assert.ok(isLanguageConfig(result));
    assert.equal(result.mode, 'ES5');
    assert.equal(result.recovery, 'stop-on-first-error');
    assert.equal(result.strictMode, 'sloppy');
    assert.equal(result.sourceName, 'b.js');
  });

  it('未知配置项违反 schema（C002）', () => {
    const file = writeConfig('unknown.json', '{"foo": 1}');
    const result = loadLanguageConfig(file);
    assert.ok(!isLanguageConfig(result));
    assert.deepEqual(
      result.map(d => [d.code, d.message, d.sourceName]),
      [['C002', '未知配置项：foo', file]]
    );
  });

  it('枚举取值无效时列出可选值', () => {
    const result = languageConfigFromJson({ mode: 'ES7' });
    assert.ok(!isLanguageConfig(result));
    assert.deepEqual(
      result.map(d => d.message),
      ['/mode 的取值无效（可选值：ES3, ES5, ES6, ES6_TYPED, ES_NEXT）']
    );
  });

  it('顶层不是对象时报告类型错误', () => {
    const result = languageConfigFromJson([]);
    assert.ok(!isLanguageConfig(result));
    assert.deepEqual(
      result.map(d => d.message),
      ['/ must be object']
    );
  });

  it('JSON 语法错误（C001）', () => {
    const file = writeConfig('broken.json', '{"mode": ');
    const result = loadLanguageConfig(file);
    assert.ok(!isLanguageConfig(result));
    assert.equal(result.length, 1);
    assert.equal(result[0]?.code, 'C001');
    assert.ok(result[0]?.message.startsWith('JSON解析失败：'));
    assert.equal(result[0]?.sourceName, file);
  });

  it('文件不存在（C001）', () => {
    const file = path.join(dir, 'missing.json');
    const result = loadLanguageConfig(file);
    assert.ok(!isLanguageConfig(result));
    assert.equal(result[0]?.code, 'C001');
    assert.ok(result[0]?.message.startsWith('读取配置文件失败：'));
  });
});
