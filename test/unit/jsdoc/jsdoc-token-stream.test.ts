import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { JsDocTokenStream } from '../../../src/jsdoc/jsdoc-token-stream.js';
import { JsDocTokenKind, type JsDocToken } from '../../../src/jsdoc/jsdoc-tokens.js';

function tokenize(body: string, startOffset = 0): JsDocToken[] {
  const stream = new JsDocTokenStream(body, startOffset);
  const tokens: JsDocToken[] = [];
  for (;;) {
    const token = stream.next();
    tokens.push(token);
    if (token.kind === JsDocTokenKind.EOF) return tokens;
  }
}

function kinds(body: string): JsDocTokenKind[] {
  return tokenize(body).map(token => token.kind);
}

function shape(body: string): Array<[JsDocTokenKind, string | null]> {
  return tokenize(body).map((token): [JsDocTokenKind, string | null] => [token.kind, token.text]);
}

describe('文档注释词法器', () => {
  it('应该切分标签、类型与描述，并跳过续行星号', () => {
    const tokens = tokenize(' @param {string} name\n * desc */', 3);
    assert.deepEqual(
      tokens.map(token => [token.kind, token.text, token.offset]),
      [
        [JsDocTokenKind.ANNOTATION, 'param', 4],
        [JsDocTokenKind.LEFT_CURLY, null, 11],
        [JsDocTokenKind.STRING, 'string', 12],
        [JsDocTokenKind.RIGHT_CURLY, null, 18],
        [JsDocTokenKind.STRING, 'name', 20],
        [JsDocTokenKind.EOL, null, 24],
        [JsDocTokenKind.STRING, 'desc', 28],
        [JsDocTokenKind.EOC, null, 33],
        [JsDocTokenKind.EOF, null, 35],
      ]
    );
  });

  it('应该识别类型语法中的全部标点', () => {
    assert.deepEqual(kinds('function(!Array<string>=):?'), [
      JsDocTokenKind.STRING,
      JsDocTokenKind.LEFT_PAREN,
      JsDocTokenKind.BANG,
      JsDocTokenKind.STRING,
      JsDocTokenKind.LEFT_ANGLE,
      JsDocTokenKind.STRING,
      JsDocTokenKind.RIGHT_ANGLE,
      JsDocTokenKind.EQUALS,
      JsDocTokenKind.RIGHT_PAREN,
      JsDocTokenKind.COLON,
      JsDocTokenKind.QMARK,
      JsDocTokenKind.EOF,
    ]);
  });

  it('行中的星号是 STAR', () => {
    assert.deepEqual(kinds('a * b'), [
      JsDocTokenKind.STRING,
      JsDocTokenKind.STAR,
      JsDocTokenKind.STRING,
      JsDocTokenKind.EOF,
    ]);
  });

  it('CRLF 只产生一个 EOL', () => {
    const tokens = tokenize('a\r\nb');
    assert.deepEqual(
      tokens.map(token => [token.kind, token.offset]),
      [
        [JsDocTokenKind.STRING, 0],
        [JsDocTokenKind.EOL, 1],
        [JsDocTokenKind.STRING, 3],
        [JsDocTokenKind.EOF, 4],
      ]
    );
  });

  describe('省略号', () => {
    it('Token 起始处的省略号独立成 Token', () => {
      const tokens = tokenize('...number');
      assert.equal(tokens[0]?.kind, JsDocTokenKind.ELLIPSIS);
      assert.equal(tokens[1]?.text, 'number');
    });

    it('原子中后跟普通字符的省略号并入原子', () => {
      assert.equal(tokenize('a...b')[0]?.text, 'a...b');
    });

    it('原子中后跟结构标点的省略号截断原子', () => {
      assert.deepEqual(kinds('a...)'), [
        JsDocTokenKind.STRING,
        JsDocTokenKind.ELLIPSIS,
        JsDocTokenKind.RIGHT_PAREN,
        JsDocTokenKind.EOF,
      ]);
    });
  });

  describe('水平空白', () => {
    it('类型表达式内部加空白不改变 Token 序列', () => {
      const compact = '@param {!Array<string>|function(...number)} x';
      const spaced = '@param  { ! Array < string > | function ( ... number ) }\tx';
      assert.deepEqual(shape(spaced), shape(compact));
      assert.deepEqual(shape(compact), [
        [JsDocTokenKind.ANNOTATION, 'param'],
        [JsDocTokenKind.LEFT_CURLY, null],
        [JsDocTokenKind.BANG, null],
        [JsDocTokenKind.STRING, 'Array'],
        [JsDocTokenKind.LEFT_ANGLE, null],
        [JsDocTokenKind.STRING, 'string'],
        [JsDocTokenKind.RIGHT_ANGLE, null],
        [JsDocTokenKind.PIPE, null],
        [JsDocTokenKind.STRING, 'function'],
        [JsDocTokenKind.LEFT_PAREN, null],
        [JsDocTokenKind.ELLIPSIS, null],
        [JsDocTokenKind.STRING, 'number'],
        [JsDocTokenKind.RIGHT_PAREN, null],
        [JsDocTokenKind.RIGHT_CURLY, null],
        [JsDocTokenKind.STRING, 'x'],
        [JsDocTokenKind.EOF, null],
      ]);
    });

    it('任意水平空白分隔的 Token 序列与单空格分隔时相同', () => {
      const word = fc.constantFrom(
        '@param',
        '@type',
        '{',
        '}',
        '<',
        '>',
        '(',
        ')',
        '[',
        ']',
        '|',
        '!',
        '?',
        '=',
        ':',
        ',',
        '...',
        'string',
        'Array',
        'x',
        'number',
        'function'
      );
      const gap = fc.constantFrom(' ', '  ', '\t', ' \t', '\f');
      fc.assert(
        fc.property(
          fc.array(word, { minLength: 1, maxLength: 20 }),
          fc.array(gap, { minLength: 1, maxLength: 8 }),
          gap,
          (words, gaps, edge) => {
            const plain = words.join(' ');
            const spaced = edge + words.map((text, index) => text + (gaps[index % gaps.length] ?? ' ')).join('');
            const expected = shape(plain);
            assert.equal(expected.length, words.length + 1);
            assert.deepEqual(shape(spaced), expected);
          }
        ),
        { numRuns: 200 }
      );
    });
  });

  it('流结束后持续返回 EOF', () => {
    const stream = new JsDocTokenStream('', 10);
    assert.deepEqual(stream.next(), { kind: JsDocTokenKind.EOF, text: null, offset: 10 });
    assert.deepEqual(stream.next(), { kind: JsDocTokenKind.EOF, text: null, offset: 10 });
  });
});
