import type {
  Expression,
  Statement,
  Literal,
  Variable,
  Binary,
  Unary,
  Assignment,
  Call,
  Block,
  VarDecl,
  FuncDecl,
  If,
  While,
  Return,
  ExprStmt,
} from '../types.js';

/**
 * AST 访问者接口：每种节点变体对应一个方法。
 *
 * - `E` 为表达式方法的返回类型，`S` 为语句方法的返回类型
 * - 新增节点变体会让所有实现者在编译期报错
 */
export interface AstVisitor<E, S = E> {
  visitLiteral(e: Literal): E;
  visitVariable(e: Variable): E;
  visitBinary(e: Binary): E;
  visitUnary(e: Unary): E;
  visitAssignment(e: Assignment): E;
  visitCall(e: Call): E;

  visitBlock(s: Block): S;
  visitVarDecl(s: VarDecl): S;
  visitFuncDecl(s: FuncDecl): S;
  visitIf(s: If): S;
  visitWhile(s: While): S;
  visitReturn(s: Return): S;
  visitExprStmt(s: ExprStmt): S;
}

function assertNever(x: never): never {
  throw new Error(`Unhandled AST node: ${JSON.stringify(x)}`);
}

/** 按表达式变体分派到访问者 */
export function visitExpression<E, S>(visitor: AstVisitor<E, S>, e: Expression): E {
  switch (e.kind) {
    case 'Literal':
      return visitor.visitLiteral(e);
    case 'Variable':
      return visitor.visitVariable(e);
    case 'Binary':
      return visitor.visitBinary(e);
    case 'Unary':
      return visitor.visitUnary(e);
    case 'Assignment':
      return visitor.visitAssignment(e);
    case 'Call':
      return visitor.visitCall(e);
    default:
      return assertNever(e);
  }
}

/** 按语句变体分派到访问者 */
export function visitStatement<E, S>(visitor: AstVisitor<E, S>, s: Statement): S {
  switch (s.kind) {
    case 'Block':
      return visitor.visitBlock(s);
    case 'VarDecl':
      return visitor.visitVarDecl(s);
    case 'FuncDecl':
      return visitor.visitFuncDecl(s);
    case 'If':
      return visitor.visitIf(s);
    case 'While':
      return visitor.visitWhile(s);
    case 'Return':
      return visitor.visitReturn(s);
    case 'ExprStmt':
      return visitor.visitExprStmt(s);
    default:
      return assertNever(s);
  }
}
