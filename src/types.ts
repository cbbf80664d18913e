// Core type definitions for the jsir front end

/**
 * 节点位置：行号从 1 开始，列号从 0 开始，length 为源码字符跨度，offset 为绝对起始偏移。
 */
export interface Position {
  readonly line: number;
  readonly column: number;
  readonly length: number;
  readonly offset: number;
}

// ---------------------------------------------------------------------------
// 类型表达式（JSDoc 类型语法与内联类型语法共用）
// ---------------------------------------------------------------------------

interface TypeBase<K extends string> {
  readonly kind: K;
  readonly position: Position | null;
}

export interface NamedType extends TypeBase<'NamedType'> {
  readonly name: string;
  readonly typeArguments: readonly TypeExpression[];
}

export type AnyType = TypeBase<'AnyType'>;
export type UnknownType = TypeBase<'UnknownType'>;
export type VoidType = TypeBase<'VoidType'>;

export interface NullableType extends TypeBase<'NullableType'> {
  readonly type: TypeExpression;
}

export interface NonNullableType extends TypeBase<'NonNullableType'> {
  readonly type: TypeExpression;
}

export interface OptionalType extends TypeBase<'OptionalType'> {
  readonly type: TypeExpression;
}

/** `...T`；单独的 `...` 表示任意类型的变长参数，此时 type 为 null。 */
export interface RestType extends TypeBase<'RestType'> {
  readonly type: TypeExpression | null;
}

export interface UnionType extends TypeBase<'UnionType'> {
  readonly alternatives: readonly TypeExpression[];
}

export interface ArrayType extends TypeBase<'ArrayType'> {
  readonly element: TypeExpression;
}

export interface RecordField {
  readonly name: string;
  readonly type: TypeExpression | null;
  readonly optional: boolean;
}

export interface RecordType extends TypeBase<'RecordType'> {
  readonly fields: readonly RecordField[];
}

export interface FunctionTypeParam {
  readonly name: string | null;
  readonly type: TypeExpression;
}

export interface FunctionType extends TypeBase<'FunctionType'> {
  readonly params: readonly FunctionTypeParam[];
  readonly returnType: TypeExpression | null;
  readonly thisType: TypeExpression | null;
  readonly newType: TypeExpression | null;
}

export type TypeExpression =
  | NamedType
  | AnyType
  | UnknownType
  | VoidType
  | NullableType
  | NonNullableType
  | OptionalType
  | RestType
  | UnionType
  | ArrayType
  | RecordType
  | FunctionType;

/** 声明类型来源：文档注释或内联类型语法，二者互斥。 */
export interface DeclaredType {
  readonly source: 'jsdoc' | 'inline';
  readonly expression: TypeExpression;
}

// ---------------------------------------------------------------------------
// 文档注释
// ---------------------------------------------------------------------------

export interface DocMarker {
  readonly annotation: string;
  readonly line: number;
  readonly column: number;
}

export interface DocParam {
  readonly name: string;
  readonly type: TypeExpression | null;
}

export type Visibility = 'public' | 'protected' | 'private' | 'package';

export interface DocFlags {
  readonly isConstructor: boolean;
  readonly interface: boolean;
  readonly record: boolean;
  readonly const: boolean;
  readonly define: boolean;
  readonly deprecated: boolean;
  readonly override: boolean;
  readonly noSideEffects: boolean;
  readonly final: boolean;
  readonly export: boolean;
  readonly fileOverview: boolean;
}

export interface DocInfo {
  /** 注释原文（含 `/**` 与 `*\/`） */
  readonly raw: string;
  readonly description: string | null;
  readonly markers: readonly DocMarker[];
  /** `/** T *\/` 形式的内联类型注释 */
  readonly inline: boolean;
  readonly type: TypeExpression | null;
  readonly returnType: TypeExpression | null;
  readonly thisType: TypeExpression | null;
  readonly enumType: TypeExpression | null;
  readonly typedefType: TypeExpression | null;
  readonly baseType: TypeExpression | null;
  readonly implementedTypes: readonly TypeExpression[];
  readonly params: readonly DocParam[];
  readonly templateNames: readonly string[];
  readonly suppressions: readonly string[];
  readonly visibility: Visibility | null;
  readonly license: string | null;
  readonly flags: DocFlags;
}

export interface Comment {
  readonly kind: 'line' | 'block' | 'jsdoc';
  readonly text: string;
  readonly position: Position;
}

// ---------------------------------------------------------------------------
// AST 节点
// ---------------------------------------------------------------------------

export interface NodeBase<K extends string> {
  readonly kind: K;
  readonly children: readonly Node[];
  /** 仅合成节点（源码中不存在对应文本）为 null */
  readonly position: Position | null;
  readonly sourceFile: string;
  readonly declaredType?: DeclaredType;
  readonly docInfo?: DocInfo;
}

export type UnaryKind = 'Not' | 'BitNot' | 'Pos' | 'Neg' | 'Typeof' | 'Void' | 'DelProp' | 'Await';

export type IncDecKind = 'Inc' | 'Dec';

export type AssignKind =
  | 'Assign'
  | 'AssignBitOr'
  | 'AssignBitXor'
  | 'AssignBitAnd'
  | 'AssignLsh'
  | 'AssignRsh'
  | 'AssignUrsh'
  | 'AssignAdd'
  | 'AssignSub'
  | 'AssignMul'
  | 'AssignDiv'
  | 'AssignMod'
  | 'AssignExponent'
  | 'AssignOr'
  | 'AssignAnd'
  | 'AssignCoalesce';

export type BinaryKind =
  | 'Or'
  | 'And'
  | 'Coalesce'
  | 'BitOr'
  | 'BitXor'
  | 'BitAnd'
  | 'Eq'
  | 'Ne'
  | 'ShEq'
  | 'ShNe'
  | 'Lt'
  | 'Le'
  | 'Gt'
  | 'Ge'
  | 'InstanceOf'
  | 'In'
  | 'Lsh'
  | 'Rsh'
  | 'Ursh'
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Mod'
  | 'Exponent'
  | 'Comma'
  | AssignKind;

export type PlainKind =
  | 'ExprResult'
  | 'True'
  | 'False'
  | 'Null'
  | 'This'
  | 'Super'
  | 'New'
  | 'Hook'
  | 'ArrayLit'
  | 'ObjectLit'
  | 'ParamList'
  | 'Block'
  | 'Var'
  | 'Let'
  | 'Const'
  | 'DestructuringLhs'
  | 'If'
  | 'While'
  | 'Do'
  | 'For'
  | 'ForIn'
  | 'ForOf'
  | 'ForAwaitOf'
  | 'Break'
  | 'Continue'
  | 'Return'
  | 'Throw'
  | 'Try'
  | 'Catch'
  | 'Switch'
  | 'Case'
  | 'DefaultCase'
  | 'With'
  | 'Debugger'
  | 'Empty'
  | 'Label'
  | 'ArrayPattern'
  | 'ObjectPattern'
  | 'DefaultValue'
  | 'Rest'
  | 'Spread'
  | 'Class'
  | 'ClassMembers'
  | 'TemplateLit'
  | 'TemplateSub'
  | 'Import'
  | 'ImportSpecs'
  | 'ImportSpec'
  | 'ImportStar'
  | 'ExportSpecs'
  | 'ExportSpec';

export type PlainNode = NodeBase<PlainKind>;

export interface UnaryNode extends NodeBase<UnaryKind> {
  readonly children: readonly [Node];
}

export interface IncDecNode extends NodeBase<IncDecKind> {
  readonly children: readonly [Node];
  readonly postfix: boolean;
}

export interface BinaryNode extends NodeBase<BinaryKind> {
  readonly children: readonly [Node, Node];
}

export interface ScriptNode extends NodeBase<'Script'> {
  /** 没有指令序言时为 null（区别于空集合） */
  readonly directives: ReadonlySet<string> | null;
  readonly comments: readonly Comment[];
}

export interface FunctionNode extends NodeBase<'Function'> {
  readonly directives: ReadonlySet<string> | null;
  readonly arrow: boolean;
  readonly generator: boolean;
  readonly async: boolean;
  /** 函数声明语句（而非函数表达式） */
  readonly declaration: boolean;
}

export interface NameNode extends NodeBase<'Name'> {
  readonly value: string;
}

export interface StringNode extends NodeBase<'String'> {
  readonly value: string;
}

export interface LabelNameNode extends NodeBase<'LabelName'> {
  readonly value: string;
}

export interface NumberNode extends NodeBase<'Number'> {
  readonly value: number;
}

export interface BigIntNode extends NodeBase<'BigInt'> {
  readonly value: bigint;
}

export interface RegExpNode extends NodeBase<'RegExp'> {
  /** 字面量源码原文（含分隔符与标志） */
  readonly value: string;
  readonly pattern: string;
  readonly flags: string;
}

export interface TemplateStringNode extends NodeBase<'TemplateString'> {
  /** 转义处理后的值；含非法转义的带标签模板为 null */
  readonly value: string | null;
  readonly raw: string;
}

export interface StringKeyNode extends NodeBase<'StringKey'> {
  readonly value: string;
  readonly quoted: boolean;
  readonly numeric: boolean;
}

export interface AccessorNode extends NodeBase<'GetterDef' | 'SetterDef'> {
  readonly value: string;
  readonly quoted: boolean;
  readonly numeric: boolean;
  readonly static: boolean;
}

export interface MemberFunctionDefNode extends NodeBase<'MemberFunctionDef'> {
  readonly value: string;
  readonly static: boolean;
}

export interface MemberFieldDefNode extends NodeBase<'MemberFieldDef'> {
  readonly value: string;
  readonly static: boolean;
}

export type ComputedMember = 'value' | 'method' | 'getter' | 'setter' | 'field';

export interface ComputedPropNode extends NodeBase<'ComputedProp'> {
  readonly member: ComputedMember;
  readonly static: boolean;
}

export interface GetPropNode extends NodeBase<'GetProp'> {
  readonly optional: boolean;
}

export interface GetElemNode extends NodeBase<'GetElem'> {
  readonly optional: boolean;
}

export interface CallNode extends NodeBase<'Call'> {
  readonly optional: boolean;
}

export interface YieldNode extends NodeBase<'Yield'> {
  readonly delegate: boolean;
}

export interface ExportNode extends NodeBase<'Export'> {
  readonly isDefault: boolean;
  readonly exportAll: boolean;
}

export type Node =
  | PlainNode
  | UnaryNode
  | IncDecNode
  | BinaryNode
  | ScriptNode
  | FunctionNode
  | NameNode
  | StringNode
  | LabelNameNode
  | NumberNode
  | BigIntNode
  | RegExpNode
  | TemplateStringNode
  | StringKeyNode
  | AccessorNode
  | MemberFunctionDefNode
  | MemberFieldDefNode
  | ComputedPropNode
  | GetPropNode
  | GetElemNode
  | CallNode
  | YieldNode
  | ExportNode;

export type NodeKind = Node['kind'];
