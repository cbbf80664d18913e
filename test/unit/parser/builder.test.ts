import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { toStringTree, typeToString, walk } from '../../../src/ast/ast_visitor.js';
import { parse, type ParseOptions } from '../../../src/parser.js';
import { patternNames } from '../../../src/parser/pattern-names.js';
import type { Node, NodeKind, ScriptNode } from '../../../src/types.js';

function rootOf(source: string, options: ParseOptions = {}): ScriptNode {
  const { root } = parse(source, options);
  assert.ok(root, `expected a tree for ${JSON.stringify(source)}`);
  return root;
}

function tree(source: string, options: ParseOptions = {}): string {
  return toStringTree(rootOf(source, options));
}

function messages(source: string, options: ParseOptions = {}): string[] {
  return parse(source, options).diagnostics.map(d => d.message);
}

function findAll(root: Node, kind: NodeKind): Node[] {
  const found: Node[] = [];
  walk(
    root,
    {
      enter: node => {
        if (node.kind === kind) found.push(node);
      },
    },
    undefined
  );
  return found;
}

function first(root: Node, kind: NodeKind): Node {
  const [node] = findAll(root, kind);
  assert.ok(node, `no ${kind} node`);
  return node;
}

describe('AST 构建', () => {
  describe('节点位置', () => {
    it('new 表达式的跨度从 new 关键字到右括号', () => {
      assert.equal(tree('new c();'), ['Script 1:0-8', '  ExprResult 1:0-8', '    New 1:0-7', '      Name c 1:4-1'].join('\n'));
    });

    it('跨行节点的长度按字符数计算，子节点使用自己的行列', () => {
      assert.equal(
        tree('new   \nc();'),
        ['Script 1:0-11', '  ExprResult 1:0-11', '    New 1:0-10', '      Name c 2:0-1'].join('\n')
      );
    });

    it('属性访问链中属性名字符串位于属性名所在行', () => {
      assert.equal(
        tree('a.\nb.\ncccc(1);'),
        [
          'Script 1:0-14',
          '  ExprResult 1:0-14',
          '    Call 1:0-13',
          '      GetProp 1:0-10',
          '        GetProp 1:0-4',
          '          Name a 1:0-1',
          '          String "b" 2:0-1',
          '        String "cccc" 3:0-4',
          '      Number 1 3:5-1',
        ].join('\n')
      );
    });

    it('数组空位生成长度为 1 的 Empty 节点', () => {
      const array = first(rootOf('[a, , b];'), 'ArrayLit');
      assert.deepEqual(
        array.children.map(child => child.kind),
        ['Name', 'Empty', 'Name']
      );
      assert.deepEqual(array.children[1]?.position, { line: 1, column: 4, length: 1, offset: 4 });
    });

    it('连续空位各自占据逗号之前的一列', () => {
      const array = first(rootOf('[,,,a,,b];'), 'ArrayLit');
      assert.deepEqual(
        array.children.map(child => child.kind),
        ['Empty', 'Empty', 'Empty', 'Name', 'Empty', 'Name']
      );
      const holes = array.children.filter(child => child.kind === 'Empty');
      assert.deepEqual(
        holes.map(hole => [hole.position?.column, hole.position?.length]),
        [
          [1, 1],
          [2, 1],
          [3, 1],
          [6, 1],
        ]
      );
    });

    it('负数字面量折叠为单个 Number 节点', () => {
      assert.equal(
        tree('x = -5;'),
        ['Script 1:0-7', '  ExprResult 1:0-7', '    Assign 1:0-6', '      Name x 1:0-1', '      Number -5 1:4-2'].join(
          '\n'
        )
      );
    });

    it('逗号表达式是左结合的二元链，外层跨度从最左到最右的叶子', () => {
      assert.equal(
        tree('a, b, c;'),
        [
          'Script 1:0-8',
          '  ExprResult 1:0-8',
          '    Comma 1:0-7',
          '      Comma 1:0-4',
          '        Name a 1:0-1',
          '        Name b 1:3-1',
          '      Name c 1:6-1',
        ].join('\n')
      );
    });

    it('getter 定义从键跨到函数体，函数节点从参数列表开始', () => {
      assert.equal(
        toStringTree(first(rootOf("({get '1'() {}});"), 'ObjectLit')),
        [
          'ObjectLit 1:1-14',
          "  GetterDef 1 quoted 1:6-8",
          '    Function 1:9-5',
          '      Name <synthetic>',
          '      ParamList 1:9-2',
          '      Block 1:12-2',
        ].join('\n')
      );
    });

    it('setter 定义的参数列表只有一个参数', () => {
      assert.equal(
        toStringTree(first(rootOf('({set x(v) {}});'), 'ObjectLit')),
        [
          'ObjectLit 1:1-13',
          '  SetterDef x 1:6-7',
          '    Function 1:7-6',
          '      Name <synthetic>',
          '      ParamList 1:7-3',
          '        Name v 1:8-1',
          '      Block 1:11-2',
        ].join('\n')
      );
    });
  });

  describe('字面量', () => {
    it('数字键标记为 quoted 与 numeric', () => {
      assert.equal(
        toStringTree(first(rootOf('({1: x});'), 'ObjectLit')),
        ['ObjectLit 1:1-6', '  StringKey 1 quoted numeric 1:2-1', '    Name x 1:5-1'].join('\n')
      );
    });

    it('字符串键只标记为 quoted', () => {
      assert.equal(
        toStringTree(first(rootOf("({'1': y});"), 'ObjectLit')),
        ['ObjectLit 1:1-8', '  StringKey 1 quoted 1:2-3', '    Name y 1:7-1'].join('\n')
      );
    });

    it('正则字面量保留源码原文', () => {
      const root = rootOf('x = /ab+c/g;');
      assert.match(toStringTree(root), /RegExp \/ab\+c\/g 1:4-7/);
      const regexp = first(root, 'RegExp');
      assert.equal(regexp.kind, 'RegExp');
      if (regexp.kind !== 'RegExp') return;
      assert.equal(regexp.value, '/ab+c/g');
      assert.equal(regexp.pattern, 'ab+c');
      assert.equal(regexp.flags, 'g');
    });
  });

  describe('语句结构', () => {
    it('没有 catch 的 try 用零长度 Empty 占位', () => {
      const node = first(rootOf('try { a(); } finally { b(); }'), 'Try');
      assert.deepEqual(node.position, { line: 1, column: 0, length: 29, offset: 0 });
      assert.deepEqual(
        node.children.map(child => `${child.kind} ${child.position?.column}-${child.position?.length}`),
        ['Block 4-8', 'Empty 12-0', 'Block 21-8']
      );
    });

    it('没有 finally 的 try 在末尾放置零长度 Empty', () => {
      const node = first(rootOf('try { } catch (e) { }'), 'Try');
      assert.equal(
        toStringTree(node),
        [
          'Try 1:0-21',
          '  Block 1:4-3',
          '  Catch 1:8-13',
          '    Name e 1:15-1',
          '    Block 1:18-3',
          '  Empty 1:21-0',
        ].join('\n')
      );
    });

    it('省略的 catch 绑定是合成的 Empty', () => {
      const catchNode = first(rootOf('try { } catch { }'), 'Catch');
      assert.equal(catchNode.children[0]?.kind, 'Empty');
      assert.equal(catchNode.children[0]?.position, null);
      assert.deepEqual(messages('try { } catch { }'), []);
    });

    it('ES6 模式下省略 catch 绑定给出特性警告', () => {
      assert.deepEqual(messages('try { } catch { }', { mode: 'ES6' }), [
        'this language feature is only supported in es_next mode: optional catch binding',
      ]);
    });

    it('switch 的 case 体包装为 Block，default 体为空 Block', () => {
      assert.equal(
        toStringTree(first(rootOf('switch (x) { case 1: a(); break; default: }'), 'Switch')),
        [
          'Switch 1:0-43',
          '  Name x 1:8-1',
          '  Case 1:13-6',
          '    Number 1 1:18-1',
          '    Block 1:21-11',
          '      ExprResult 1:21-4',
          '        Call 1:21-3',
          '          Name a 1:21-1',
          '      Break 1:26-6',
          '  DefaultCase 1:33-7',
          '    Block 1:41-0',
        ].join('\n')
      );
    });

    it('连续标签按源码顺序嵌套，最内层包裹语句', () => {
      const source = 'Foo:Bar:X:{ break Bar; }';
      assert.deepEqual(messages(source), []);
      assert.equal(
        tree(source),
        [
          'Script 1:0-24',
          '  Label 1:0-24',
          '    LabelName Foo 1:0-3',
          '    Label 1:4-20',
          '      LabelName Bar 1:4-3',
          '      Label 1:8-16',
          '        LabelName X 1:8-1',
          '        Block 1:10-14',
          '          Break 1:12-10',
          '            LabelName Bar 1:18-3',
        ].join('\n')
      );
    });

    it('参数列表的绑定名称按声明顺序提取，不含默认值表达式中的名称', () => {
      const params = first(rootOf('function f([x1, x2], {y1, y2}, z = 0) {}'), 'ParamList');
      assert.deepEqual(
        patternNames(params).map(name => name.value),
        ['x1', 'x2', 'y1', 'y2', 'z']
      );
      const withNameDefault = first(rootOf('function g([a], b = a) {}'), 'ParamList');
      assert.deepEqual(
        patternNames(withNameDefault).map(name => name.value),
        ['a', 'b']
      );
    });
  });

  describe('指令序言', () => {
    it('脚本开头的字符串语句成为指令', () => {
      const root = rootOf("'use strict';\nvar x;");
      assert.ok(root.directives?.has('use strict'));
      assert.deepEqual(
        root.children.map(child => child.kind),
        ['Var']
      );
    });

    it('没有指令时 directives 为 null', () => {
      assert.equal(rootOf('var x;').directives, null);
    });

    it('函数体的指令记录在 Function 节点上', () => {
      const fn = first(rootOf("function f() { 'use strict'; }"), 'Function');
      assert.equal(fn.kind, 'Function');
      if (fn.kind !== 'Function') return;
      assert.ok(fn.directives?.has('use strict'));
    });
  });

  describe('严格模式与目标校验', () => {
    it('严格模式下 delete 名称报错并指向操作数', () => {
      const { diagnostics } = parse("'use strict';\ndelete x;");
      assert.equal(diagnostics.length, 1);
      assert.equal(diagnostics[0]?.message, 'Invalid delete operand. Only properties can be deleted.');
      assert.equal(diagnostics[0]?.position.line, 2);
      assert.equal(diagnostics[0]?.position.column, 7);
      assert.equal(diagnostics[0]?.position.length, 1);
    });

    it('宽松模式下 delete 名称不报错', () => {
      assert.deepEqual(messages('delete x;', { strictMode: 'sloppy' }), []);
    });

    it('ES5 模式下 for-in 不接受解构目标', () => {
      assert.deepEqual(messages('for ([a, b] in o);', { mode: 'ES5' }), ['Invalid LHS for a for-in loop']);
    });

    const validTargets = ['x=1;', 'x.y=1;', 'f().y=1;'];
    for (const source of validTargets) {
      it(`${source} 是合法的赋值目标`, () => {
        assert.deepEqual(messages(source), []);
      });
    }

    const invalidTargets: ReadonlyArray<[string, string]> = [
      ['(x||y)=1;', 'invalid assignment target'],
      ['(x?y:z)=1;', 'invalid assignment target'],
      ['f()=1;', 'invalid assignment target'],
      ['f()+=1;', 'invalid assignment target'],
      ['f()++;', 'invalid increment target'],
      ['f()--;', 'invalid decrement target'],
      ['++f();', 'invalid increment target'],
      ['--f();', 'invalid decrement target'],
      ['(a+b)++;', 'Invalid increment operand'],
      ['--(a+b);', 'Invalid decrement operand'],
    ];
    for (const [source, message] of invalidTargets) {
      it(`${source} → ${message}`, () => {
        assert.deepEqual(messages(source), [message]);
      });
    }

    it('非法赋值目标的诊断指向目标本身（不含括号）', () => {
      const { root, diagnostics } = parse('(x||y)=1;');
      assert.ok(root);
      assert.deepEqual(
        diagnostics.map(d => [d.code, d.position]),
        [['S001', { line: 1, column: 1, length: 4, offset: 1 }]]
      );
    });

    it('ES_NEXT 模式下 for-in 的解构目标为 ArrayPattern', () => {
      const { root, diagnostics } = parse('for ([a, b] in o);', { mode: 'ES_NEXT' });
      assert.deepEqual(diagnostics, []);
      assert.ok(root);
      assert.equal(first(root, 'ForIn').children[0]?.kind, 'ArrayPattern');
    });
  });

  describe('上下文校验', () => {
    const cases: ReadonlyArray<[string, string]> = [
      ['return 1;', 'return must be inside function'],
      ['break;', 'unlabelled break must be inside loop or switch'],
      ['continue;', 'continue must be inside loop'],
      ['foo: while (1) { continue bar; }', 'undefined label "bar"'],
      ['foo: { continue foo; }', 'continue can only use labeles of iteration statements'],
      ['a: a: x;', 'Duplicate label "a"'],
    ];
    for (const [source, message] of cases) {
      it(`${source} → ${message}`, () => {
        assert.deepEqual(messages(source), [message]);
      });
    }

    it('重复参数名是警告', () => {
      const { diagnostics } = parse('function f(a, a) {}');
      assert.deepEqual(
        diagnostics.map(d => [d.severity, d.message]),
        [['warning', 'Duplicate parameter name "a"']]
      );
    });

    it('循环内的 break 与 continue 合法', () => {
      assert.deepEqual(messages('while (1) { if (x) break; continue; }'), []);
    });
  });

  describe('语言模式', () => {
    it('JS 模式下 enum 是不支持的特性', () => {
      assert.deepEqual(messages('enum E { A }'), ['unsupported language feature: enums']);
    });

    it('类型语法模式下 as 表达式不支持', () => {
      assert.deepEqual(messages('x as y;', { mode: 'ES6_TYPED' }), ['unsupported language feature: as expressions']);
    });

    it('ES5 模式下 let 声明给出特性警告', () => {
      const { diagnostics } = parse('let x = 1;', { mode: 'ES5' });
      assert.deepEqual(
        diagnostics.map(d => [d.severity, d.message]),
        [['warning', 'this language feature is only supported in es6 mode: let declarations']]
      );
    });
  });

  describe('恢复策略', () => {
    it('stop-on-first-error 遇到首个错误即放弃整棵树', () => {
      const { root, diagnostics } = parse('break; continue;', { recovery: 'stop-on-first-error' });
      assert.equal(root, null);
      assert.equal(diagnostics.length, 1);
    });

    it('keep-going 模式下语法错误仍然产出树', () => {
      const { root, diagnostics } = parse('var = 1;');
      assert.ok(root);
      assert.equal(diagnostics[0]?.code, 'P001');
      assert.equal(diagnostics[0]?.severity, 'error');
    });
  });

  describe('文档注释', () => {
    it('函数声明认领前置的 JSDoc', () => {
      const { root, diagnostics } = parse('/** @param {string} x */\nfunction f(x) {}');
      assert.deepEqual(diagnostics, []);
      assert.ok(root);
      const fn = first(root, 'Function');
      assert.deepEqual(fn.docInfo?.markers, [{ annotation: 'param', line: 1, column: 4 }]);
      const params = fn.docInfo?.params ?? [];
      assert.deepEqual(
        params.map(param => [param.name, param.type && typeToString(param.type)]),
        [['x', 'string']]
      );
      assert.deepEqual(
        root.comments.map(comment => comment.kind),
        ['jsdoc']
      );
    });

    it('表达式语句上的 @type 位置不当', () => {
      assert.deepEqual(messages('/** @type {number} */ x + 1;'), [
        'Type annotations are not allowed here. Are you missing parentheses?',
      ]);
    });

    it('括号内的 @type 是类型转换', () => {
      assert.deepEqual(messages('var y = /** @type {number} */ (x);'), []);
    });
  });

  describe('内联类型语法', () => {
    it('ES6_TYPED 模式下变量名携带内联类型', () => {
      const { root, diagnostics } = parse('var x: number = 1;', { mode: 'ES6_TYPED' });
      assert.deepEqual(diagnostics, []);
      assert.ok(root);
      const name = first(root, 'Name');
      assert.equal(name.declaredType?.source, 'inline');
      assert.equal(name.declaredType?.expression.kind, 'NamedType');
      assert.match(toStringTree(root), /Name x 1:4-1 : number \(inline\)/);
    });

    it('未启用类型语法时给出警告', () => {
      assert.deepEqual(messages('var x: number = 1;', { mode: 'ES6' }), ['support for type syntax is not enabled']);
    });

    it('JSDoc 类型与内联类型不能同时出现', () => {
      assert.deepEqual(messages('/** @type {string} */ var x: number;', { mode: 'ES6_TYPED' }), [
        'Bad type syntax - can only have JSDoc or inline type annotations, not both',
      ]);
    });

    it('冲突时名称保留 JSDoc 类型作为声明类型', () => {
      const { root, diagnostics } = parse("var /** string */ foo: string = 'hello';", { mode: 'ES6_TYPED' });
      assert.deepEqual(
        diagnostics.map(d => d.message),
        ['Bad type syntax - can only have JSDoc or inline type annotations, not both']
      );
      assert.ok(root);
      assert.equal(
        toStringTree(first(root, 'Name')),
        ['Name foo 1:18-3 : string (jsdoc) [jsdoc]', '  String "hello" 1:32-7'].join('\n')
      );
    });

    it('没有内联注解时名称同样取 JSDoc 类型', () => {
      const name = first(rootOf("var /** string */ foo = 'hello';"), 'Name');
      assert.equal(name.declaredType?.source, 'jsdoc');
      assert.equal(name.declaredType && typeToString(name.declaredType.expression), 'string');
    });

    it('@param 类型成为参数的声明类型', () => {
      const param = first(rootOf('/** @param {string} x */\nfunction f(x) {}'), 'ParamList').children[0];
      assert.ok(param);
      assert.equal(param.declaredType?.source, 'jsdoc');
      assert.equal(param.declaredType && typeToString(param.declaredType.expression), 'string');
    });

    it('@param 与内联参数类型冲突时保留 @param 类型', () => {
      const { root, diagnostics } = parse('/** @param {string} x */\nfunction f(x: number) {}', { mode: 'ES6_TYPED' });
      assert.deepEqual(
        diagnostics.map(d => d.message),
        ['Bad type syntax - can only have JSDoc or inline type annotations, not both']
      );
      assert.ok(root);
      const param = first(root, 'ParamList').children[0];
      assert.equal(param?.declaredType?.source, 'jsdoc');
      assert.equal(param?.declaredType && typeToString(param.declaredType.expression), 'string');
    });

    it('@return 与内联返回类型冲突时函数保留 @return 类型', () => {
      const { root, diagnostics } = parse('/** @return {number} */\nfunction f(): string {}', { mode: 'ES6_TYPED' });
      assert.deepEqual(
        diagnostics.map(d => d.message),
        ['Bad type syntax - can only have JSDoc or inline type annotations, not both']
      );
      assert.ok(root);
      const fn = first(root, 'Function');
      assert.equal(fn.declaredType?.source, 'jsdoc');
      assert.equal(fn.declaredType && typeToString(fn.declaredType.expression), 'number');
    });

    it('带默认值的参数同时产生 DefaultValue 节点与声明类型', () => {
      const { root, diagnostics } = parse("function f(x: string = 'hello') {}", { mode: 'ES6_TYPED' });
      assert.deepEqual(diagnostics, []);
      assert.ok(root);
      assert.equal(
        toStringTree(first(root, 'DefaultValue')),
        ['DefaultValue 1:11-19', '  Name x 1:11-1 : string (inline)', '  String "hello" 1:23-7'].join('\n')
      );
    });

    it('箭头函数参数的默认值与类型', () => {
      const { root, diagnostics } = parse("(x: string = 'hello') => x;", { mode: 'ES6_TYPED' });
      assert.deepEqual(diagnostics, []);
      assert.ok(root);
      assert.equal(
        toStringTree(first(root, 'DefaultValue')),
        ['DefaultValue 1:1-19', '  Name x 1:1-1 : string (inline)', '  String "hello" 1:13-7'].join('\n')
      );
    });

    const typedPatterns = ['([x]: string) => 1;', 'function f([x: string]) {}', 'function f({x}: string) {}'];
    for (const source of typedPatterns) {
      it(`带类型的解构参数尚不支持：${source}`, () => {
        assert.deepEqual(messages(source, { mode: 'ES6_TYPED' }), ["',' expected"]);
      });
    }
  });
});
