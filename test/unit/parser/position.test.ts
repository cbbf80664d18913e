import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LineMap, positionAfter, skipTrivia, spanBetween } from '../../../src/parser/position.js';

describe('行列换算', () => {
  // a b \n c d \r\n e f \r g U+2028 h
  const text = 'ab\ncd\r\nef\rg\u2028h';
  const lineMap = new LineMap(text);

  it('应该识别全部五种行终止符', () => {
    assert.equal(lineMap.lineCount, 5);
    assert.equal(lineMap.lineStart(1), 0);
    assert.equal(lineMap.lineStart(2), 3);
    assert.equal(lineMap.lineStart(3), 7);
    assert.equal(lineMap.lineStart(4), 10);
    assert.equal(lineMap.lineStart(5), 12);
    assert.equal(lineMap.lineStart(9), -1);
  });

  it('行号从 1 开始，列号从 0 开始', () => {
    assert.deepEqual(lineMap.lineAndColumn(0), { line: 1, column: 0 });
    assert.deepEqual(lineMap.lineAndColumn(4), { line: 2, column: 1 });
    assert.deepEqual(lineMap.lineAndColumn(12), { line: 5, column: 0 });
  });

  it('CRLF 中的 \\n 仍属于上一行', () => {
    assert.deepEqual(lineMap.lineAndColumn(6), { line: 2, column: 3 });
  });

  it('越界偏移被截断到文本末尾', () => {
    assert.deepEqual(lineMap.lineAndColumn(100), { line: 5, column: 1 });
  });

  it('位置记录起点与长度，反向区间长度为 0', () => {
    assert.deepEqual(lineMap.positionOf(3, 5), { line: 2, column: 0, length: 2, offset: 3 });
    assert.deepEqual(lineMap.positionOf(5, 3), { line: 2, column: 2, length: 0, offset: 5 });
  });

  it('跨度与紧随位置', () => {
    const first = lineMap.positionOf(0, 1);
    const last = lineMap.positionOf(3, 5);
    assert.deepEqual(spanBetween(lineMap, first, last), { line: 1, column: 0, length: 5, offset: 0 });
    assert.deepEqual(positionAfter(lineMap, last), { line: 2, column: 2, length: 0, offset: 5 });
  });
});

describe('跳过空白与注释', () => {
  it('应该跳过行注释与块注释', () => {
    assert.equal(skipTrivia('  // c\n /* x */ a', 0), 16);
  });

  it('未闭合的块注释延伸到文本末尾', () => {
    assert.equal(skipTrivia('/* open', 0), 7);
  });

  it('除号不是注释', () => {
    assert.equal(skipTrivia('x / y', 1), 2);
    assert.equal(skipTrivia('a', 0), 0);
  });
});
