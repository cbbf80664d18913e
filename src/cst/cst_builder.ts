import ts from 'typescript';
import type { CommentRange, ConcreteParseOptions, ConcreteSyntaxError, ConcreteTree } from './cst.js';

const VIRTUAL_ROOT = '/__jsir__/';

function virtualFileName(typed: boolean): string {
  return `${VIRTUAL_ROOT}source.${typed ? 'ts' : 'js'}`;
}

function isJsDocNode(node: ts.Node): boolean {
  return node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode;
}

function commentKind(range: ts.CommentRange, text: string): CommentRange['kind'] {
  if (range.kind === ts.SyntaxKind.SingleLineCommentTrivia) return 'line';
  const body = text.slice(range.pos, range.end);
  return body.startsWith('/**') && body !== '/**/' ? 'jsdoc' : 'block';
}

/**
 * 收集全部注释。
 *
 * 每段 trivia 都是某个叶子 Token 的前导 trivia：同一行上的部分由 trailing 区间给出，
 * 换行之后的部分由 leading 区间给出，两者合并即为该段 trivia 中的全部注释。
 */
function collectComments(root: ts.SourceFile): CommentRange[] {
  const text = root.text;
  const byStart = new Map<number, CommentRange>();
  const addRanges = (ranges: readonly ts.CommentRange[] | undefined): void => {
    for (const range of ranges ?? []) {
      if (byStart.has(range.pos)) continue;
      byStart.set(range.pos, {
        kind: commentKind(range, text),
        start: range.pos,
        end: range.end,
        text: text.slice(range.pos, range.end),
      });
    }
  };

  const visit = (node: ts.Node): void => {
    if (isJsDocNode(node)) return;
    const children = node.getChildren(root);
    if (children.length === 0) {
      addRanges(ts.getLeadingCommentRanges(text, node.pos));
      addRanges(ts.getTrailingCommentRanges(text, node.pos));
      return;
    }
    for (const child of children) visit(child);
  };
  visit(root);

  return [...byStart.values()].sort((a, b) => a.start - b.start);
}

function stripTrailingPeriod(message: string): string {
  return message.endsWith('.') ? message.slice(0, -1) : message;
}

/** 8000-8999 为“仅 TypeScript 文件可用”一类提示，由构建器自己按语言模式处理 */
function isTypeScriptOnlyNotice(code: number): boolean {
  return code >= 8000 && code < 9000;
}

function collectSyntaxErrors(root: ts.SourceFile): ConcreteSyntaxError[] {
  const options: ts.CompilerOptions = {
    allowJs: true,
    noLib: true,
    noResolve: true,
    noEmit: true,
    types: [],
    target: ts.ScriptTarget.Latest,
  };
  const host: ts.CompilerHost = {
    getSourceFile: fileName => (fileName === root.fileName ? root : undefined),
    getDefaultLibFileName: () => `${VIRTUAL_ROOT}lib.d.ts`,
    writeFile: () => undefined,
    getCurrentDirectory: () => VIRTUAL_ROOT,
    getCanonicalFileName: fileName => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => '\n',
    fileExists: fileName => fileName === root.fileName,
    readFile: fileName => (fileName === root.fileName ? root.text : undefined),
  };
  const program = ts.createProgram({ rootNames: [root.fileName], options, host });

  const errors: ConcreteSyntaxError[] = [];
  for (const diagnostic of program.getSyntacticDiagnostics(root)) {
    if (isTypeScriptOnlyNotice(diagnostic.code)) continue;
    errors.push({
      message: stripTrailingPeriod(ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n')),
      start: diagnostic.start ?? 0,
      length: diagnostic.length ?? 0,
    });
  }
  return errors;
}

/**
 * 用 TypeScript 编译器 API 解析源码，得到具体语法树。
 *
 * 非类型化模式按 JavaScript 解析；ES6_TYPED 按 TypeScript 解析以接受内联类型语法。
 */
export function parseConcreteTree(text: string, options: ConcreteParseOptions): ConcreteTree {
  const root = ts.createSourceFile(
    virtualFileName(options.typed),
    text,
    ts.ScriptTarget.Latest,
    true,
    options.typed ? ts.ScriptKind.TS : ts.ScriptKind.JS
  );
  return {
    text,
    typed: options.typed,
    root,
    comments: collectComments(root),
    syntaxErrors: collectSyntaxErrors(root),
  };
}
