import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { typeToString } from '../../../src/ast/ast_visitor.js';
import { DiagnosticsCollector } from '../../../src/diagnostics/collector.js';
import {
  hasAnnotations,
  hasSuspiciousAnnotation,
  parseInlineTypeDoc,
  parseJsDocComment,
} from '../../../src/jsdoc/jsdoc-parser.js';
import { LineMap } from '../../../src/parser/position.js';
import type { Comment, DocInfo } from '../../../src/types.js';

interface Parsed {
  doc: DocInfo;
  diagnostics: DiagnosticsCollector;
}

function parseDoc(text: string, inline = false): Parsed {
  const lineMap = new LineMap(text);
  const diagnostics = new DiagnosticsCollector('keep-going', 'doc.js');
  const comment: Comment = { kind: 'jsdoc', text, position: lineMap.positionOf(0, text.length) };
  const ctx = { lineMap, diagnostics };
  return { doc: inline ? parseInlineTypeDoc(comment, ctx) : parseJsDocComment(comment, ctx), diagnostics };
}

describe('JSDoc 解析', () => {
  it('每个标签记录 @ 所在的行列', () => {
    const { doc, diagnostics } = parseDoc('/** @param {string} x\n * @return {number} */');
    assert.deepEqual(doc.markers, [
      { annotation: 'param', line: 1, column: 4 },
      { annotation: 'return', line: 2, column: 3 },
    ]);
    assert.deepEqual(
      doc.params.map(param => [param.name, param.type && typeToString(param.type)]),
      [['x', 'string']]
    );
    assert.equal(doc.returnType && typeToString(doc.returnType), 'number');
    assert.equal(doc.description, null);
    assert.equal(diagnostics.count, 0);
  });

  it('方括号参数名把类型包装为可选类型', () => {
    const { doc } = parseDoc('/** @param {string} [opt] */');
    assert.deepEqual(
      doc.params.map(param => [param.name, param.type && typeToString(param.type)]),
      [['opt', 'string=']]
    );
  });

  it('未闭合的类型花括号降级为警告并指向注释结尾', () => {
    const { doc, diagnostics } = parseDoc('/** @type {string */');
    assert.equal(doc.type, null);
    assert.deepEqual(
      diagnostics.all.map(d => [d.severity, d.message, d.position]),
      [['warning', 'Bad type annotation. expected closing }', { line: 1, column: 18, length: 2, offset: 18 }]]
    );
    assert.equal(diagnostics.all[0]?.sourceName, 'doc.js');
  });

  it('描述取第一个标签之前的文本，标志标签写入 flags', () => {
    const { doc } = parseDoc('/**\n * Adds numbers.\n * @constructor\n * @deprecated\n */');
    assert.equal(doc.description, 'Adds numbers.');
    assert.equal(doc.flags.isConstructor, true);
    assert.equal(doc.flags.deprecated, true);
    assert.equal(doc.flags.override, false);
  });

  it('顶层联合类型带括号输出', () => {
    const { doc } = parseDoc('/** @type {number|string} */');
    assert.equal(doc.type && typeToString(doc.type), '(number|string)');
  });

  it('重复的 @type 给出 extra tag 警告并保留第一个', () => {
    const { doc, diagnostics } = parseDoc('/** @type {number} @type {string} */');
    assert.equal(doc.type && typeToString(doc.type), 'number');
    assert.deepEqual(
      diagnostics.all.map(d => d.message),
      ['extra @type tag']
    );
  });

  it('内联类型注释解析整段正文', () => {
    const { doc, diagnostics } = parseDoc('/** ?Array<string> */', true);
    assert.equal(doc.inline, true);
    assert.equal(doc.type && typeToString(doc.type), '?Array<string>');
    assert.equal(doc.description, null);
    assert.equal(diagnostics.count, 0);
  });

  it('识别普通块注释里可疑的标签', () => {
    assert.equal(hasSuspiciousAnnotation('/* @param {string} x */'), true);
    assert.equal(hasSuspiciousAnnotation('/** @param {string} x */'), false);
    assert.equal(hasSuspiciousAnnotation('/* email me at a@b.c */'), false);
  });

  it('判断文档注释是否含标签', () => {
    assert.equal(hasAnnotations('/** @const */'), true);
    assert.equal(hasAnnotations('/** string */'), false);
  });
});
