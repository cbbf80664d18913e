import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isEquivalentTo } from '../../../src/ast/ast_visitor.js';
import { parse, type ParseOptions } from '../../../src/parser.js';
import { printCode, quoteString, typeToTypeScript } from '../../../src/printer/code-printer.js';
import type { ScriptNode } from '../../../src/types.js';

function rootOf(source: string, options: ParseOptions = {}): ScriptNode {
  const { root, diagnostics } = parse(source, options);
  assert.deepEqual(
    diagnostics.map(d => d.message),
    []
  );
  assert.ok(root);
  return root;
}

function print(source: string, options: ParseOptions = {}): string {
  return printCode(rootOf(source, options));
}

describe('代码打印', () => {
  it('内联文档注释紧贴函数名打印', () => {
    assert.equal(
      print("function /** string */ foo() { return 'hello'; }"),
      "function/** string */foo() {\n  return'hello';\n}"
    );
  });

  it('变量声明与初始值', () => {
    assert.equal(print('var x = 1;'), 'var x = 1;');
  });

  it('if 的分支总是打印为块', () => {
    assert.equal(print('if (a) b(); else { c(); }'), 'if (a) {\n  b();\n} else {\n  c();\n}');
  });

  it('按优先级补回括号', () => {
    assert.equal(print('(a + b) * c;'), '(a + b) * c;');
    assert.equal(print('a - -b;'), 'a - -b;');
  });

  it('语句开头的对象字面量加括号', () => {
    assert.equal(print('({a: 1});'), '({a: 1});');
  });

  it('内联类型打印为 TypeScript 语法', () => {
    assert.equal(print('var x: number = 1;', { mode: 'ES6_TYPED' }), 'var x: number = 1;');
  });

  it('指令序言打印在最前面', () => {
    assert.equal(print("'use strict';\nvar x;"), "'use strict';\nvar x;");
  });

  describe('重新解析后结构等价', () => {
    const sources = [
      'a.b.c(1, 2);',
      'x = a ? b : c;',
      'for (var i = 0; i < 10; i++) { f(i); }',
      'label: while (x) { break label; }',
      'try { a(); } catch (e) { b(e); } finally { c(); }',
      'var [a, , b] = xs;',
      'new (f())();',
      'a ?? (b || c);',
    ];
    for (const source of sources) {
      it(source, () => {
        const first = rootOf(source);
        const second = rootOf(printCode(first));
        assert.ok(isEquivalentTo(first, second), printCode(first));
      });
    }
  });
});

describe('字符串与类型文本', () => {
  it('字符串使用单引号并转义控制字符', () => {
    assert.equal(quoteString("it's\n"), "'it\\'s\\n'");
    assert.equal(quoteString('\u0001'), "'\\x01'");
  });

  it('可空类型转为联合 null', () => {
    assert.equal(
      typeToTypeScript({
        kind: 'NullableType',
        type: { kind: 'NamedType', name: 'string', typeArguments: [], position: null },
        position: null,
      }),
      'string | null'
    );
  });
});
