import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { isEquivalentTo, walk } from '../../src/ast/ast_visitor.js';
import { parse } from '../../src/parser.js';
import { printCode } from '../../src/printer/code-printer.js';
import type { ScriptNode } from '../../src/types.js';

const identifier = fc.constantFrom('a', 'b', 'c', 'foo', 'bar', '$x', '_y');
const integer = fc.nat({ max: 999 }).map(String);
const operator = fc.constantFrom('+', '-', '*', '/', '%', '<', '>=', '&&', '||', '==', '===', '|', '&');

// 每个子表达式都带括号，生成的文本总是可以解析
const { expression } = fc.letrec<{ expression: string; leaf: string; compound: string }>(tie => ({
  leaf: fc.oneof(identifier, integer),
  compound: fc.oneof(
    fc.tuple(tie('expression'), operator, tie('expression')).map(([left, op, right]) => `(${left} ${op} ${right})`),
    fc.tuple(identifier, fc.array(tie('expression'), { maxLength: 3 })).map(([callee, args]) => `${callee}(${args.join(', ')})`),
    fc.tuple(identifier, identifier).map(([object, property]) => `${object}.${property}`),
    fc.tuple(identifier, tie('expression')).map(([target, value]) => `(${target} = ${value})`)
  ),
  expression: fc.oneof({ depthSize: 'small', withCrossShrink: true }, tie('leaf'), tie('compound')),
}));

const statement = expression.map(text => `${text};`);

function rootOf(source: string): ScriptNode {
  const { root, diagnostics } = parse(source);
  assert.deepEqual(
    diagnostics.map(d => d.message),
    [],
    source
  );
  assert.ok(root, source);
  return root;
}

describe('解析器性质', () => {
  it('打印结果重新解析后结构等价', () => {
    fc.assert(
      fc.property(statement, source => {
        const first = rootOf(source);
        const second = rootOf(printCode(first));
        return isEquivalentTo(first, second);
      }),
      { numRuns: 200 }
    );
  });

  it('打印是幂等的', () => {
    fc.assert(
      fc.property(statement, source => {
        const printed = printCode(rootOf(source));
        return printCode(rootOf(printed)) === printed;
      }),
      { numRuns: 200 }
    );
  });

  it('额外的空白不改变树结构', () => {
    const spacing = fc.constantFrom(' ', '  ', '\t', ' \t ');
    fc.assert(
      fc.property(statement, fc.array(spacing, { minLength: 1, maxLength: 8 }), (source, gaps) => {
        let index = 0;
        const spaced = source.replace(/ /g, () => gaps[index++ % gaps.length] ?? ' ');
        return isEquivalentTo(rootOf(source), rootOf(spaced));
      }),
      { numRuns: 200 }
    );
  });

  it('所有节点位置都落在源码范围内', () => {
    fc.assert(
      fc.property(statement, source => {
        let valid = true;
        walk(
          rootOf(source),
          {
            enter: node => {
              const position = node.position;
              if (position === null) return;
              valid &&=
                position.line >= 1 &&
                position.column >= 0 &&
                position.length >= 0 &&
                position.offset >= 0 &&
                position.offset + position.length <= source.length;
            },
          },
          undefined
        );
        return valid;
      }),
      { numRuns: 200 }
    );
  });

  it('任意输入都不会抛出异常', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 60 }), input => {
        const result = parse(input);
        return result.root !== null || result.diagnostics.length > 0;
      }),
      { numRuns: 200 }
    );
  });
});
