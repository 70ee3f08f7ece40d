/**
 * 语句解析与恐慌模式错误恢复
 */

import { DataType } from '../types.js';
import type { Block, DeclarationKeyword, Expression, Parameter, Statement } from '../types.js';
import type { ParserContext } from './context.js';
import { TokenKind } from '../frontend/tokens.js';
import { Node } from '../ast/ast.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { consume, errorAtCurrent, isParseError, synchronize, type Parsed } from './parser-tools.js';
import { parseExpression } from './expr-parser.js';
import { parseType } from './type-parser.js';

const DECLARATION_KEYWORDS: ReadonlyMap<TokenKind, DeclarationKeyword> = new Map([
  [TokenKind.VAR, 'var'],
  [TokenKind.LET, 'let'],
  [TokenKind.CONST, 'const'],
]);

/**
 * 语句循环：解析语句直到遇到终止 Token 或文件末尾。
 *
 * 单条语句失败时记录诊断并同步；同步未能前进时强制跳过一个 Token，
 * 保证循环总能消费完全部输入。
 */
export function parseStatementList(ctx: ParserContext, terminator: TokenKind | null): Statement[] {
  const statements: Statement[] = [];
  while (!ctx.isAtEnd() && (terminator === null || !ctx.check(terminator))) {
    const start = ctx.index;
    const stmt = parseStatement(ctx);
    if (isParseError(stmt)) {
      ctx.debug.log(`recovering from: ${stmt.diagnostic.message}`);
      ctx.sink.report(stmt.diagnostic);
      synchronize(ctx);
      if (ctx.index === start) ctx.advance();
      continue;
    }
    statements.push(stmt);
  }
  return statements;
}

export function parseStatement(ctx: ParserContext): Parsed<Statement> {
  const tok = ctx.peek();
  ctx.debug.depth++;
  ctx.debug.log(`statement at ${tok.kind}`);
  try {
    const keyword = DECLARATION_KEYWORDS.get(tok.kind);
    if (keyword !== undefined) {
      ctx.advance();
      return parseVarDeclaration(ctx, keyword, tok.location);
    }
    switch (tok.kind) {
      case TokenKind.FUNCTION:
        ctx.advance();
        return parseFunctionDeclaration(ctx);
      case TokenKind.IF:
        ctx.advance();
        return parseIfStatement(ctx, tok.location);
      case TokenKind.WHILE:
        ctx.advance();
        return parseWhileStatement(ctx, tok.location);
      case TokenKind.RETURN:
        ctx.advance();
        return parseReturnStatement(ctx, tok.location);
      case TokenKind.LEFT_BRACE:
        ctx.advance();
        return parseBlock(ctx, tok.location);
      case TokenKind.FOR:
        return errorAtCurrent(ctx, t => Diagnostics.unsupportedStatement(t.lexeme, t.location));
      default:
        return parseExpressionStatement(ctx);
    }
  } finally {
    ctx.debug.depth--;
  }
}

/**
 * 解析块语句的剩余部分（`{` 已被消费）。
 */
export function parseBlock(ctx: ParserContext, location: Block['location']): Parsed<Block> {
  ctx.blockDepth++;
  const statements = parseStatementList(ctx, TokenKind.RIGHT_BRACE);
  ctx.blockDepth--;
  const close = consume(ctx, TokenKind.RIGHT_BRACE, "Expect '}' after block.");
  if (isParseError(close)) return close;
  return Node.Block(statements, location);
}

function parseExpressionStatement(ctx: ParserContext): Parsed<Statement> {
  const location = ctx.peek().location;
  const expr = parseExpression(ctx);
  if (isParseError(expr)) return expr;
  const semi = consume(ctx, TokenKind.SEMICOLON, "Expect ';' after expression.");
  if (isParseError(semi)) return semi;
  return Node.ExprStmt(expr, location);
}

function parseIfStatement(ctx: ParserContext, location: Statement['location']): Parsed<Statement> {
  const open = consume(ctx, TokenKind.LEFT_PAREN, "Expect '(' after 'if'.");
  if (isParseError(open)) return open;
  const condition = parseExpression(ctx);
  if (isParseError(condition)) return condition;
  const close = consume(ctx, TokenKind.RIGHT_PAREN, "Expect ')' after if condition.");
  if (isParseError(close)) return close;

  const thenBranch = parseStatement(ctx);
  if (isParseError(thenBranch)) return thenBranch;

  let elseBranch: Statement | null = null;
  if (ctx.match(TokenKind.ELSE)) {
    const parsed = parseStatement(ctx);
    if (isParseError(parsed)) return parsed;
    elseBranch = parsed;
  }
  return Node.If(condition, thenBranch, elseBranch, location);
}

function parseWhileStatement(ctx: ParserContext, location: Statement['location']): Parsed<Statement> {
  const open = consume(ctx, TokenKind.LEFT_PAREN, "Expect '(' after 'while'.");
  if (isParseError(open)) return open;
  const condition = parseExpression(ctx);
  if (isParseError(condition)) return condition;
  const close = consume(ctx, TokenKind.RIGHT_PAREN, "Expect ')' after condition.");
  if (isParseError(close)) return close;

  const body = parseStatement(ctx);
  if (isParseError(body)) return body;
  return Node.While(condition, body, location);
}

function parseReturnStatement(ctx: ParserContext, location: Statement['location']): Parsed<Statement> {
  let value: Expression | null = null;
  if (!ctx.check(TokenKind.SEMICOLON)) {
    const parsed = parseExpression(ctx);
    if (isParseError(parsed)) return parsed;
    value = parsed;
  }
  const semi = consume(ctx, TokenKind.SEMICOLON, "Expect ';' after return value.");
  if (isParseError(semi)) return semi;
  return Node.Return(value, location);
}

function parseVarDeclaration(
  ctx: ParserContext,
  keyword: DeclarationKeyword,
  location: Statement['location']
): Parsed<Statement> {
  const name = consume(ctx, TokenKind.IDENTIFIER, 'Expect variable name.');
  if (isParseError(name)) return name;

  let declaredType: DataType = DataType.UNKNOWN;
  if (ctx.match(TokenKind.COLON)) {
    const type = parseType(ctx);
    if (isParseError(type)) return type;
    declaredType = type;
  }

  let initializer: Expression | null = null;
  if (ctx.match(TokenKind.ASSIGN)) {
    const parsed = parseExpression(ctx);
    if (isParseError(parsed)) return parsed;
    initializer = parsed;
  }

  const semi = consume(ctx, TokenKind.SEMICOLON, "Expect ';' after variable declaration.");
  if (isParseError(semi)) return semi;
  return Node.VarDecl(keyword, name.lexeme, declaredType, initializer, location);
}

function parseFunctionDeclaration(ctx: ParserContext): Parsed<Statement> {
  const name = consume(ctx, TokenKind.IDENTIFIER, 'Expect function name.');
  if (isParseError(name)) return name;
  const open = consume(ctx, TokenKind.LEFT_PAREN, "Expect '(' after function name.");
  if (isParseError(open)) return open;
  const params = parseParameters(ctx);
  if (isParseError(params)) return params;
  const close = consume(ctx, TokenKind.RIGHT_PAREN, "Expect ')' after parameters.");
  if (isParseError(close)) return close;

  let returnType: DataType = DataType.VOID;
  if (ctx.match(TokenKind.COLON)) {
    const type = parseType(ctx);
    if (isParseError(type)) return type;
    returnType = type;
  }

  const brace = consume(ctx, TokenKind.LEFT_BRACE, "Expect '{' before function body.");
  if (isParseError(brace)) return brace;
  const body = parseBlock(ctx, brace.location);
  if (isParseError(body)) return body;
  return Node.FuncDecl(name.lexeme, returnType, params, body, name.location);
}

function parseParameters(ctx: ParserContext): Parsed<Parameter[]> {
  const params: Parameter[] = [];
  if (ctx.check(TokenKind.RIGHT_PAREN)) return params;
  do {
    const name = consume(ctx, TokenKind.IDENTIFIER, 'Expect parameter name.');
    if (isParseError(name)) return name;
    const colon = consume(ctx, TokenKind.COLON, "Expect ':' after parameter name.");
    if (isParseError(colon)) return colon;
    const type = parseType(ctx);
    if (isParseError(type)) return type;
    params.push(Node.Parameter(name.lexeme, type, name.location));
  } while (ctx.match(TokenKind.COMMA));
  return params;
}
