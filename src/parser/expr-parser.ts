/**
 * 表达式解析：按优先级逐层下降。
 *
 * 优先级（低 → 高）：赋值（右结合）→ `||` → `&&` → `== !=` → `< <= > >=`
 * → `+ -` → `* / %` → 一元 `! -` → 调用/基本表达式。其余层级均为左结合。
 */

import { DataType } from '../types.js';
import type { BinaryOperator, Expression, UnaryOperator } from '../types.js';
import type { ParserContext } from './context.js';
import { TokenKind } from '../frontend/tokens.js';
import { Node } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { consume, errorAtCurrent, isParseError, type Parsed } from './parser-tools.js';

type Level = (ctx: ParserContext) => Parsed<Expression>;

const LOGICAL_OR: ReadonlyMap<TokenKind, BinaryOperator> = new Map([[TokenKind.OR, '||']]);
const LOGICAL_AND: ReadonlyMap<TokenKind, BinaryOperator> = new Map([[TokenKind.AND, '&&']]);
const EQUALITY: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.EQUAL, '=='],
  [TokenKind.NOT_EQUAL, '!='],
]);
const COMPARISON: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.LESS, '<'],
  [TokenKind.LESS_EQUAL, '<='],
  [TokenKind.GREATER, '>'],
  [TokenKind.GREATER_EQUAL, '>='],
]);
const TERM: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.PLUS, '+'],
  [TokenKind.MINUS, '-'],
]);
const FACTOR: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.STAR, '*'],
  [TokenKind.SLASH, '/'],
  [TokenKind.PERCENT, '%'],
]);
const UNARY: ReadonlyMap<TokenKind, UnaryOperator> = new Map([
  [TokenKind.NOT, '!'],
  [TokenKind.MINUS, '-'],
]);

const LITERAL_TYPES: ReadonlyMap<TokenKind, DataType> = new Map([
  [TokenKind.INTEGER, DataType.INT],
  [TokenKind.FLOAT, DataType.FLOAT],
  [TokenKind.STRING, DataType.STRING],
  [TokenKind.BOOL, DataType.BOOL],
  // null 没有可表达的类型，语义分析时保持 unknown
  [TokenKind.NULL, DataType.UNKNOWN],
]);

/**
 * 解析表达式（入口为赋值层）
 */
export function parseExpression(ctx: ParserContext): Parsed<Expression> {
  return parseAssignment(ctx);
}

function parseAssignment(ctx: ParserContext): Parsed<Expression> {
  const expr = parseLogicalOr(ctx);
  if (isParseError(expr)) return expr;

  if (ctx.match(TokenKind.ASSIGN)) {
    const equals = ctx.previous();
    const value = parseAssignment(ctx);
    if (isParseError(value)) return value;

    if (expr.kind === 'Variable') {
      return Node.Assignment(expr.name, value, equals.location);
    }
    // 可恢复：报告后以右侧表达式作为结果继续
    ctx.sink.report(Diagnostics.invalidAssignmentTarget(equals.location));
    return value;
  }
  return expr;
}

function leftAssociative(next: Level, operators: ReadonlyMap<TokenKind, BinaryOperator>): Level {
  return (ctx: ParserContext): Parsed<Expression> => {
    let left = next(ctx);
    if (isParseError(left)) return left;

    for (;;) {
      const op = operators.get(ctx.peek().kind);
      if (op === undefined) return left;
      const opTok = ctx.advance();
      const right = next(ctx);
      if (isParseError(right)) return right;
      left = Node.Binary(left, op, right, opTok.location);
    }
  };
}

function parseUnary(ctx: ParserContext): Parsed<Expression> {
  const op = UNARY.get(ctx.peek().kind);
  if (op !== undefined) {
    const opTok = ctx.advance();
    const operand = parseUnary(ctx);
    if (isParseError(operand)) return operand;
    return Node.Unary(op, operand, opTok.location);
  }
  return parsePrimary(ctx);
}

const parseFactor = leftAssociative(parseUnary, FACTOR);
const parseTerm = leftAssociative(parseFactor, TERM);
const parseComparison = leftAssociative(parseTerm, COMPARISON);
const parseEquality = leftAssociative(parseComparison, EQUALITY);
const parseLogicalAnd = leftAssociative(parseEquality, LOGICAL_AND);
const parseLogicalOr = leftAssociative(parseLogicalAnd, LOGICAL_OR);

function parsePrimary(ctx: ParserContext): Parsed<Expression> {
  const tok = ctx.peek();

  const literalType = LITERAL_TYPES.get(tok.kind);
  if (literalType !== undefined) {
    ctx.advance();
    return Node.Literal(tok.lexeme, literalType, tok.location);
  }

  if (tok.kind === TokenKind.IDENTIFIER) {
    ctx.advance();
    if (ctx.match(TokenKind.LEFT_PAREN)) return parseCallArguments(ctx, tok.lexeme, tok.location);
    return Node.Variable(tok.lexeme, tok.location);
  }

  if (tok.kind === TokenKind.LEFT_PAREN) {
    ctx.advance();
    const inner = parseExpression(ctx);
    if (isParseError(inner)) return inner;
    const close = consume(ctx, TokenKind.RIGHT_PAREN, "Expect ')' after expression.");
    if (isParseError(close)) return close;
    return inner;
  }

  return errorAtCurrent(ctx, t => Diagnostics.expectedExpression(t.location));
}

function parseCallArguments(
  ctx: ParserContext,
  callee: string,
  location: Expression['location']
): Parsed<Expression> {
  const args: Expression[] = [];
  if (!ctx.check(TokenKind.RIGHT_PAREN)) {
    do {
      const arg = parseExpression(ctx);
      if (isParseError(arg)) return arg;
      args.push(arg);
    } while (ctx.match(TokenKind.COMMA));
  }
  const close = consume(ctx, TokenKind.RIGHT_PAREN, "Expect ')' after arguments.");
  if (isParseError(close)) return close;
  return Node.Call(callee, args, location);
}
