import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Node, type NodeFrame } from '../../../src/ast/ast.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { validateDeleteOperand, validateTarget } from '../../../src/parser/target-validator.js';
import type { Node as AstNode } from '../../../src/types.js';

const frame: NodeFrame = { position: { line: 1, column: 0, length: 1, offset: 0 }, sourceFile: 'a.js' };

const name = (value: string) => Node.name(value, frame);
const prop = (object: AstNode, optional = false) =>
  Node.getProp(object, Node.string('p', frame), optional, frame);

describe('赋值与自增目标', () => {
  it('名称与属性访问是合法目标', () => {
    for (const operation of ['assign', 'compound-assign', 'increment', 'decrement'] as const) {
      assert.deepEqual(validateTarget(name('a'), operation), { ok: true });
      assert.deepEqual(validateTarget(prop(name('a')), operation), { ok: true });
    }
  });

  it('解构模式只能用于简单赋值', () => {
    const pattern = Node.plain('ArrayPattern', [name('a')], frame);
    assert.deepEqual(validateTarget(pattern, 'assign'), { ok: true });
    const verdict = validateTarget(pattern, 'compound-assign');
    assert.equal(verdict.ok, false);
    if (!verdict.ok) {
      assert.equal(verdict.code, DiagnosticCode.S001_InvalidAssignmentTarget);
      assert.equal(verdict.message, 'invalid assignment target');
      assert.deepEqual(verdict.position, frame.position);
    }
  });

  it('可选链中的属性访问不能被赋值', () => {
    const verdict = validateTarget(prop(prop(name('a'), true)), 'assign');
    assert.equal(verdict.ok, false);
  });

  it('调用作为自增目标与其他表达式作为操作数的消息不同', () => {
    const call = Node.call(name('f'), [], false, frame);
    const increment = validateTarget(call, 'increment');
    assert.ok(!increment.ok);
    assert.equal(increment.code, DiagnosticCode.S002_InvalidUpdateTarget);
    assert.equal(increment.message, 'invalid increment target');

    const decrement = validateTarget(Node.number(1, frame), 'decrement');
    assert.ok(!decrement.ok);
    assert.equal(decrement.code, DiagnosticCode.S003_InvalidUpdateOperand);
    assert.equal(decrement.message, 'Invalid decrement operand');
  });
});

describe('delete 操作数', () => {
  it('属性访问总是合法', () => {
    const element = Node.getElem(name('a'), Node.number(0, frame), false, frame);
    assert.deepEqual(validateDeleteOperand(element, true), { ok: true });
  });

  it('名称只在非严格代码中合法', () => {
    assert.deepEqual(validateDeleteOperand(name('a'), false), { ok: true });
    const verdict = validateDeleteOperand(name('a'), true);
    assert.ok(!verdict.ok);
    assert.equal(verdict.message, 'Invalid delete operand. Only properties can be deleted.');
  });

  it('其他表达式总是非法', () => {
    assert.equal(validateDeleteOperand(Node.number(1, frame), false).ok, false);
  });
});
