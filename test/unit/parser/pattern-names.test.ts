import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Node, type NodeFrame } from '../../../src/ast/ast.js';
import { collectPatternNames, patternNames } from '../../../src/parser/pattern-names.js';
import type { Node as AstNode } from '../../../src/types.js';

const frame: NodeFrame = { position: null, sourceFile: 'a.js' };
const name = (value: string, children: readonly AstNode[] = []) => Node.name(value, frame, children);
const plain = Node.plain;

function names(node: AstNode): string[] {
  return patternNames(node).map(n => n.value);
}

describe('绑定名称提取', () => {
  it('数组模式按声明顺序产出默认值与剩余元素中的名称', () => {
    const pattern = plain(
      'ArrayPattern',
      [
        name('a'),
        plain('DefaultValue', [name('b'), Node.number(1, frame)], frame),
        plain('Rest', [name('c')], frame),
      ],
      frame
    );
    assert.deepEqual(names(pattern), ['a', 'b', 'c']);
  });

  it('对象模式产出属性值中的名称，不产出计算键', () => {
    const pattern = plain(
      'ObjectPattern',
      [
        Node.stringKey('x', { quoted: false, numeric: false }, [name('y')], frame),
        Node.computedProp('value', false, name('k'), name('z'), frame),
      ],
      frame
    );
    assert.deepEqual(names(pattern), ['y', 'z']);
  });

  it('声明中的初始化表达式不绑定名称', () => {
    const declaration = plain(
      'Let',
      [
        name('a', [name('init')]),
        plain(
          'DestructuringLhs',
          [plain('ArrayPattern', [name('b')], frame), name('source')],
          frame
        ),
      ],
      frame
    );
    assert.deepEqual(names(declaration), ['a', 'b']);
  });

  it('重复的名称不去重', () => {
    const params = plain('ParamList', [name('a'), name('a')], frame);
    assert.deepEqual(names(params), ['a', 'a']);
  });

  it('回调按顺序收到同一个节点对象', () => {
    const a = name('a');
    const seen: AstNode[] = [];
    collectPatternNames(plain('ParamList', [a], frame), n => seen.push(n));
    assert.equal(seen[0], a);
  });

  it('非模式节点不产出名称', () => {
    assert.deepEqual(names(Node.number(1, frame)), []);
  });
});
