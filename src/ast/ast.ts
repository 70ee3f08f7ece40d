// Simple AST node constructors
import { DataType } from '../types.js';
import type * as AST from '../types.js';

export const Node = {
  Literal: (value: string, literalType: DataType, location: AST.SourceLocation): AST.Literal => ({
    kind: 'Literal',
    value,
    literalType,
    type: DataType.UNKNOWN,
    location,
  }),
  Variable: (name: string, location: AST.SourceLocation): AST.Variable => ({
    kind: 'Variable',
    name,
    type: DataType.UNKNOWN,
    location,
  }),
  Binary: (
    left: AST.Expression,
    op: AST.BinaryOperator,
    right: AST.Expression,
    location: AST.SourceLocation
  ): AST.Binary => ({
    kind: 'Binary',
    left,
    op,
    right,
    type: DataType.UNKNOWN,
    location,
  }),
  Unary: (op: AST.UnaryOperator, operand: AST.Expression, location: AST.SourceLocation): AST.Unary => ({
    kind: 'Unary',
    op,
    operand,
    type: DataType.UNKNOWN,
    location,
  }),
  Assignment: (name: string, value: AST.Expression, location: AST.SourceLocation): AST.Assignment => ({
    kind: 'Assignment',
    name,
    value,
    type: DataType.UNKNOWN,
    location,
  }),
  Call: (callee: string, args: readonly AST.Expression[], location: AST.SourceLocation): AST.Call => ({
    kind: 'Call',
    callee,
    args,
    type: DataType.UNKNOWN,
    location,
  }),
  Block: (statements: readonly AST.Statement[], location: AST.SourceLocation): AST.Block => ({
    kind: 'Block',
    statements,
    location,
  }),
  VarDecl: (
    keyword: AST.DeclarationKeyword,
    name: string,
    declaredType: DataType,
    initializer: AST.Expression | null,
    location: AST.SourceLocation
  ): AST.VarDecl => ({
    kind: 'VarDecl',
    keyword,
    name,
    declaredType,
    initializer,
    resolvedType: DataType.UNKNOWN,
    location,
  }),
  Parameter: (name: string, type: DataType, location: AST.SourceLocation): AST.Parameter => ({
    name,
    type,
    location,
  }),
  FuncDecl: (
    name: string,
    returnType: DataType,
    params: readonly AST.Parameter[],
    body: AST.Block,
    location: AST.SourceLocation
  ): AST.FuncDecl => ({
    kind: 'FuncDecl',
    name,
    returnType,
    params,
    body,
    location,
  }),
  If: (
    condition: AST.Expression,
    thenBranch: AST.Statement,
    elseBranch: AST.Statement | null,
    location: AST.SourceLocation
  ): AST.If => ({
    kind: 'If',
    condition,
    thenBranch,
    elseBranch,
    location,
  }),
  While: (condition: AST.Expression, body: AST.Statement, location: AST.SourceLocation): AST.While => ({
    kind: 'While',
    condition,
    body,
    location,
  }),
  Return: (value: AST.Expression | null, location: AST.SourceLocation): AST.Return => ({
    kind: 'Return',
    value,
    location,
  }),
  ExprStmt: (expression: AST.Expression, location: AST.SourceLocation): AST.ExprStmt => ({
    kind: 'ExprStmt',
    expression,
    location,
  }),
  Program: (statements: readonly AST.Statement[]): AST.Program => ({
    kind: 'Program',
    statements,
  }),
};
