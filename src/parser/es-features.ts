/**
 * @module es-features
 *
 * 语言模式门控：ES6 / ES_NEXT 特性名称、保留字表。
 */

/** 低于 ES6 模式时警告的特性 */
export const Es6Feature = {
  destructuring: 'destructuring',
  generators: 'generators',
  memberDeclarations: 'member declarations',
  arrowFunctions: 'short function syntax',
  defaultParameters: 'default parameters',
  restParameters: 'rest parameters',
  spread: 'spread expression',
  extendedObjectLiterals: 'extended object literals',
  computedProperty: 'computed property',
  templateLiterals: 'template literals',
  constDeclarations: 'const declarations',
  letDeclarations: 'let declarations',
  classes: 'class',
  superKeyword: 'super',
  modules: 'modules',
  forOf: 'for-of',
} as const;

/** 仅 ES_NEXT 模式支持的特性 */
export const EsNextFeature = {
  asyncFunctions: 'async function',
  forAwaitOf: 'for-await-of',
  exponent: 'exponent operator',
  optionalChaining: 'optional chaining',
  nullishCoalescing: 'nullish coalescing',
  logicalAssignment: 'logical assignment',
  objectSpread: 'object literals with spread',
  objectRest: 'object pattern rest',
  optionalCatchBinding: 'optional catch binding',
  bigint: 'bigint',
  classFields: 'public class fields',
  numericSeparators: 'numeric separators',
} as const;

export type Es6FeatureName = (typeof Es6Feature)[keyof typeof Es6Feature];
export type EsNextFeatureName = (typeof EsNextFeature)[keyof typeof EsNextFeature];

export const ES5_RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'class',
  'const',
  'enum',
  'export',
  'extends',
  'import',
  'super',
]);

export const ES5_STRICT_RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  ...ES5_RESERVED_KEYWORDS,
  'implements',
  'interface',
  'let',
  'package',
  'private',
  'protected',
  'public',
  'static',
  'yield',
]);

/** ES3 中不能作为未加引号属性名使用的关键字与保留字 */
export const ES3_KEYWORDS: ReadonlySet<string> = new Set([
  'break',
  'case',
  'catch',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'finally',
  'for',
  'function',
  'if',
  'in',
  'instanceof',
  'new',
  'return',
  'switch',
  'this',
  'throw',
  'try',
  'typeof',
  'var',
  'void',
  'while',
  'with',
  'null',
  'true',
  'false',
  ...ES5_STRICT_RESERVED_KEYWORDS,
]);

export const REGEXP_FLAGS = {
  es5: new Set(['g', 'i', 'm']),
  es6: new Set(['u', 'y']),
  esNext: new Set(['s', 'd', 'v']),
} as const;
