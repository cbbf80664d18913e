import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DefaultAstVisitor,
  Node,
  NodeDraft,
  countNodes,
  describePayload,
  isEquivalentTo,
  nextSibling,
  parse,
  reposition,
  type ScriptNode,
} from '../../../src/index.js';
import type { Node as AstNode } from '../../../src/types.js';

function rootOf(source: string): ScriptNode {
  const { root } = parse(source);
  assert.ok(root);
  return root;
}

class NameCollector extends DefaultAstVisitor<string[]> {
  visitNode(node: AstNode, names: string[]): void {
    if (node.kind === 'Name') names.push(node.value);
    super.visitNode(node, names);
  }
}

describe('AST 遍历与比较', () => {
  it('countNodes 统计整棵子树', () => {
    // Script、ExprResult、Call、Name a、Name b
    assert.equal(countNodes(rootOf('a(b);')), 5);
  });

  it('默认访问器按先序访问全部子节点', () => {
    const names: string[] = [];
    new NameCollector().visit(rootOf('f(a, b.c);'), names);
    assert.deepEqual(names, ['f', 'a', 'b']);
  });

  it('nextSibling 越界时返回 null', () => {
    const call = rootOf('f(a, b.c);').children[0]?.children[0];
    assert.ok(call);
    assert.equal(nextSibling(call, 0)?.kind, 'Name');
    assert.equal(nextSibling(call, 2), null);
  });

  it('结构等价忽略位置', () => {
    assert.equal(isEquivalentTo(rootOf('a+b;'), rootOf('a  +  b;')), true);
    assert.equal(isEquivalentTo(rootOf('a+b;'), rootOf('a-b;')), false);
    assert.equal(isEquivalentTo(rootOf('x++;'), rootOf('++x;')), false);
  });

  it('载荷描述后缀自增', () => {
    const inc = rootOf('x++;').children[0]?.children[0];
    assert.ok(inc);
    assert.equal(describePayload(inc), 'postfix');
  });

  it('节点冻结，reposition 返回新节点', () => {
    const frame = { position: { line: 1, column: 0, length: 1, offset: 0 }, sourceFile: 'a.js' };
    const name = Node.name('a', frame);
    assert.ok(Object.isFrozen(name));
    const moved = reposition(name, null);
    assert.equal(moved.position, null);
    assert.equal(name.position?.length, 1);
  });

  it('NodeDraft 忽略空子节点', () => {
    const frame = { position: null, sourceFile: 'a.js' };
    const block = new NodeDraft()
      .add(Node.name('a', frame))
      .add(null)
      .add(undefined)
      .close(children => Node.plain('Block', children, frame));
    assert.equal(block.children.length, 1);
  });
});
