// Core type definitions for Cinder

/**
 * 源代码位置（1 起始的行列号，0 起始的字符偏移）。
 *
 * 不可变值对象，在管道各阶段之间按值复制，不共享。
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface Span {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export enum TokenKind {
  // Literals
  INTEGER = 'INTEGER',
  FLOAT = 'FLOAT',
  STRING = 'STRING',
  BOOL = 'BOOL',
  NULL = 'NULL',
  IDENTIFIER = 'IDENTIFIER',

  // Keywords
  IF = 'IF',
  ELSE = 'ELSE',
  WHILE = 'WHILE',
  FOR = 'FOR',
  RETURN = 'RETURN',
  FUNCTION = 'FUNCTION',
  VAR = 'VAR',
  LET = 'LET',
  CONST = 'CONST',

  // Operators
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  STAR = 'STAR',
  SLASH = 'SLASH',
  PERCENT = 'PERCENT',
  ASSIGN = 'ASSIGN',
  EQUAL = 'EQUAL',
  NOT_EQUAL = 'NOT_EQUAL',
  LESS = 'LESS',
  LESS_EQUAL = 'LESS_EQUAL',
  GREATER = 'GREATER',
  GREATER_EQUAL = 'GREATER_EQUAL',
  AND = 'AND',
  OR = 'OR',
  NOT = 'NOT',

  // Delimiters
  LEFT_PAREN = 'LEFT_PAREN',
  RIGHT_PAREN = 'RIGHT_PAREN',
  LEFT_BRACE = 'LEFT_BRACE',
  RIGHT_BRACE = 'RIGHT_BRACE',
  LEFT_BRACKET = 'LEFT_BRACKET',
  RIGHT_BRACKET = 'RIGHT_BRACKET',
  SEMICOLON = 'SEMICOLON',
  COMMA = 'COMMA',
  COLON = 'COLON',
  DOT = 'DOT',

  // Special
  END_OF_FILE = 'END_OF_FILE',
  ERROR = 'ERROR',
}

/**
 * 词法单元。
 *
 * ERROR 类型的 token 在 `lexeme` 中携带诊断消息；STRING 的 `lexeme` 不含引号。
 */
export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly location: SourceLocation;
}

export enum DataType {
  VOID = 'void',
  INT = 'int',
  FLOAT = 'float',
  BOOL = 'bool',
  STRING = 'string',
  FUNCTION = 'function',
  UNKNOWN = 'unknown',
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = '&&' | '||';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;
export type UnaryOperator = '-' | '!';

export type DeclarationKeyword = 'var' | 'let' | 'const';

// ==================== AST ====================

interface NodeBase {
  readonly location: SourceLocation;
}

/**
 * 表达式节点的公共字段。
 *
 * `type` 由解析器初始化为 `unknown`，语义分析阶段回填；这是 AST 上唯一允许修改的字段。
 */
interface ExpressionBase extends NodeBase {
  type: DataType;
}

export interface Literal extends ExpressionBase {
  readonly kind: 'Literal';
  readonly value: string;
  readonly literalType: DataType;
}

export interface Variable extends ExpressionBase {
  readonly kind: 'Variable';
  readonly name: string;
}

export interface Binary extends ExpressionBase {
  readonly kind: 'Binary';
  readonly left: Expression;
  readonly op: BinaryOperator;
  readonly right: Expression;
}

export interface Unary extends ExpressionBase {
  readonly kind: 'Unary';
  readonly op: UnaryOperator;
  readonly operand: Expression;
}

export interface Assignment extends ExpressionBase {
  readonly kind: 'Assignment';
  readonly name: string;
  readonly value: Expression;
}

export interface Call extends ExpressionBase {
  readonly kind: 'Call';
  readonly callee: string;
  readonly args: readonly Expression[];
}

export type Expression = Literal | Variable | Binary | Unary | Assignment | Call;

export interface Block extends NodeBase {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
}

export interface VarDecl extends NodeBase {
  readonly kind: 'VarDecl';
  readonly keyword: DeclarationKeyword;
  readonly name: string;
  readonly declaredType: DataType;
  readonly initializer: Expression | null;
  /** 推断后的槽位类型，由语义分析回填 */
  resolvedType: DataType;
}

export interface Parameter extends NodeBase {
  readonly name: string;
  readonly type: DataType;
}

export interface FuncDecl extends NodeBase {
  readonly kind: 'FuncDecl';
  readonly name: string;
  readonly returnType: DataType;
  readonly params: readonly Parameter[];
  readonly body: Block;
}

export interface If extends NodeBase {
  readonly kind: 'If';
  readonly condition: Expression;
  readonly thenBranch: Statement;
  readonly elseBranch: Statement | null;
}

export interface While extends NodeBase {
  readonly kind: 'While';
  readonly condition: Expression;
  readonly body: Statement;
}

export interface Return extends NodeBase {
  readonly kind: 'Return';
  readonly value: Expression | null;
}

export interface ExprStmt extends NodeBase {
  readonly kind: 'ExprStmt';
  readonly expression: Expression;
}

export type Statement = Block | VarDecl | FuncDecl | If | While | Return | ExprStmt;

export interface Program {
  readonly kind: 'Program';
  readonly statements: readonly Statement[];
}

// ==================== IR ====================

/**
 * 低层 IR：模块 → 函数 → 基本块 → 指令。
 *
 * - 局部变量与参数使用栈槽（slot），通过 load/store 访问
 * - 基本块以 id 在函数内寻址，回边通过 id 表达，不存在循环所有权
 * - 每个基本块恰好以一条终结指令（br/condbr/ret）结尾
 */
export namespace IR {
  export type Type = 'void' | 'i32' | 'f64' | 'i1' | 'ptr';

  export interface ConstInt {
    readonly kind: 'ConstInt';
    readonly type: 'i32' | 'i1';
    readonly value: number;
  }

  export interface ConstFloat {
    readonly kind: 'ConstFloat';
    readonly type: 'f64';
    readonly value: number;
  }

  export interface ConstString {
    readonly kind: 'ConstString';
    readonly type: 'ptr';
    readonly value: string;
  }

  export interface Param {
    readonly kind: 'Param';
    readonly type: Type;
    readonly index: number;
    readonly name: string;
  }

  export interface Temp {
    readonly kind: 'Temp';
    readonly type: Type;
    readonly id: number;
  }

  /** void 调用的结果；不可作为操作数使用 */
  export interface Void {
    readonly kind: 'Void';
    readonly type: 'void';
  }

  export type Constant = ConstInt | ConstFloat | ConstString;
  export type Value = Constant | Param | Temp | Void;

  export type BinaryOpcode =
    | 'add'
    | 'sub'
    | 'mul'
    | 'sdiv'
    | 'srem'
    | 'fadd'
    | 'fsub'
    | 'fmul'
    | 'fdiv'
    | 'frem'
    | 'and'
    | 'or';

  export type ComparePredicate = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';
  export type UnaryOpcode = 'neg' | 'fneg' | 'not';
  export type CastOpcode = 'sitofp' | 'fptosi';

  export interface Alloca {
    readonly op: 'alloca';
    readonly slot: number;
    readonly type: Type;
  }

  export interface Load {
    readonly op: 'load';
    readonly result: Temp;
    readonly slot: number;
  }

  export interface Store {
    readonly op: 'store';
    readonly slot: number;
    readonly value: Value;
  }

  /** 模块级全局变量的读写，按名称寻址 */
  export interface LoadGlobal {
    readonly op: 'gload';
    readonly result: Temp;
    readonly global: string;
  }

  export interface StoreGlobal {
    readonly op: 'gstore';
    readonly global: string;
    readonly value: Value;
  }

  export interface BinaryInst {
    readonly op: 'binary';
    readonly opcode: BinaryOpcode;
    readonly result: Temp;
    readonly lhs: Value;
    readonly rhs: Value;
  }

  export interface Compare {
    readonly op: 'icmp' | 'fcmp';
    readonly predicate: ComparePredicate;
    readonly result: Temp;
    readonly lhs: Value;
    readonly rhs: Value;
  }

  export interface UnaryInst {
    readonly op: 'unary';
    readonly opcode: UnaryOpcode;
    readonly result: Temp;
    readonly operand: Value;
  }

  export interface Cast {
    readonly op: 'cast';
    readonly opcode: CastOpcode;
    readonly result: Temp;
    readonly value: Value;
  }

  export interface CallInst {
    readonly op: 'call';
    readonly callee: string;
    readonly args: readonly Value[];
    readonly returnType: Type;
    readonly result: Temp | null;
  }

  export interface Br {
    readonly op: 'br';
    readonly target: number;
  }

  export interface CondBr {
    readonly op: 'condbr';
    readonly condition: Value;
    readonly ifTrue: number;
    readonly ifFalse: number;
  }

  export interface Ret {
    readonly op: 'ret';
    readonly value: Value | null;
  }

  export type Terminator = Br | CondBr | Ret;
  export type Instruction =
    | Alloca
    | Load
    | Store
    | LoadGlobal
    | StoreGlobal
    | BinaryInst
    | Compare
    | UnaryInst
    | Cast
    | CallInst
    | Terminator;

  export interface Slot {
    readonly id: number;
    readonly name: string;
    readonly type: Type;
  }

  export interface BasicBlock {
    readonly id: number;
    readonly label: string;
    readonly instructions: Instruction[];
    readonly successors: number[];
  }

  export interface FunctionParam {
    readonly name: string;
    readonly type: Type;
  }

  export interface Function {
    readonly name: string;
    readonly params: readonly FunctionParam[];
    readonly returnType: Type;
    /** 外部声明（无函数体），如内置函数 */
    readonly external: boolean;
    readonly variadic: boolean;
    readonly blocks: BasicBlock[];
    readonly slots: Slot[];
  }

  /** 顶层变量；初值为类型零值，由顶层函数中的 gstore 写入实际初始值 */
  export interface Global {
    readonly name: string;
    readonly type: Type;
    readonly initializer: Constant;
  }

  export interface Module {
    readonly name: string;
    readonly globals: Global[];
    readonly functions: Function[];
  }
}
