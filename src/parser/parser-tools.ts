/**
 * 解析器工具函数集合
 * 提供语法错误值、期望验证和同步恢复等辅助功能
 */

import { TokenKind } from '../frontend/tokens.js';
import type { Token } from '../types.js';
import type { Diagnostic, DiagnosticBuilder } from '../diagnostics/diagnostics.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';

/**
 * 语法错误。
 *
 * 作为结果值沿解析函数向上返回，不会被抛出；
 * 语句循环负责记录诊断并执行同步。
 */
export class ParseError {
  constructor(readonly diagnostic: Diagnostic) {}
}

export type Parsed<T> = T | ParseError;

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError;
}

/**
 * 在当前位置构造语法错误。到达文件末尾时定位到最后一个已消费的 Token。
 */
export function errorAtCurrent(ctx: ParserContext, build: (tok: Token) => DiagnosticBuilder): ParseError {
  const tok = ctx.isAtEnd() && ctx.index > 0 ? ctx.previous() : ctx.peek();
  return new ParseError(build(tok).build());
}

/**
 * 期望并消费指定种类的 Token。
 */
export function consume(ctx: ParserContext, kind: TokenKind, message: string): Parsed<Token> {
  if (ctx.check(kind)) return ctx.advance();
  const tok = ctx.peek();
  const builder =
    kind === TokenKind.IDENTIFIER
      ? Diagnostics.expectedIdentifier(message, tok.location)
      : Diagnostics.expectedToken(message, tok.location);
  return new ParseError(builder.build());
}

const SYNC_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.FUNCTION,
  TokenKind.VAR,
  TokenKind.LET,
  TokenKind.CONST,
  TokenKind.FOR,
  TokenKind.IF,
  TokenKind.WHILE,
  TokenKind.RETURN,
]);

/**
 * 恐慌模式同步：丢弃 Token，直到上一个 Token 是 `;` 或当前 Token 可以开始一条语句。
 *
 * 在块内部时 `}` 也是同步点，使外层块能够正常闭合。
 */
export function synchronize(ctx: ParserContext): void {
  while (!ctx.isAtEnd()) {
    if (ctx.index > 0 && ctx.previous().kind === TokenKind.SEMICOLON) return;
    const kind = ctx.peek().kind;
    if (SYNC_KINDS.has(kind)) return;
    if (ctx.blockDepth > 0 && kind === TokenKind.RIGHT_BRACE) return;
    ctx.advance();
  }
}
