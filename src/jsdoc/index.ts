export { JsDocTokenKind, type JsDocToken } from './jsdoc-tokens.js';
export { JsDocTokenStream } from './jsdoc-token-stream.js';
export { JsDocCursor, JsDocTypeParser, TypeSyntaxDetail } from './jsdoc-type-parser.js';
export {
  parseJsDocComment,
  parseInlineTypeDoc,
  hasAnnotations,
  hasSuspiciousAnnotation,
  isFileLevelDoc,
  type JsDocParseContext,
} from './jsdoc-parser.js';
