/**
 * @module tokens
 *
 * Token 种类、关键字表与运算符词素表，以及 token 的文本渲染。
 */

import { TokenKind } from '../types.js';
import type { Token } from '../types.js';
import { formatLocation } from './location.js';

export { TokenKind };

/**
 * 关键字表：标识符扫描完成后按整词查表。
 *
 * `true`/`false`/`null` 也在此表中，分别映射到字面量种类。
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ['if', TokenKind.IF],
  ['else', TokenKind.ELSE],
  ['while', TokenKind.WHILE],
  ['for', TokenKind.FOR],
  ['return', TokenKind.RETURN],
  ['function', TokenKind.FUNCTION],
  ['var', TokenKind.VAR],
  ['let', TokenKind.LET],
  ['const', TokenKind.CONST],
  ['true', TokenKind.BOOL],
  ['false', TokenKind.BOOL],
  ['null', TokenKind.NULL],
]);

/** 双字符运算符，必须先于单字符运算符匹配 */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenKind> = new Map([
  ['==', TokenKind.EQUAL],
  ['!=', TokenKind.NOT_EQUAL],
  ['<=', TokenKind.LESS_EQUAL],
  ['>=', TokenKind.GREATER_EQUAL],
  ['&&', TokenKind.AND],
  ['||', TokenKind.OR],
]);

export const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenKind> = new Map([
  ['+', TokenKind.PLUS],
  ['-', TokenKind.MINUS],
  ['*', TokenKind.STAR],
  ['/', TokenKind.SLASH],
  ['%', TokenKind.PERCENT],
  ['=', TokenKind.ASSIGN],
  ['<', TokenKind.LESS],
  ['>', TokenKind.GREATER],
  ['!', TokenKind.NOT],
  ['(', TokenKind.LEFT_PAREN],
  [')', TokenKind.RIGHT_PAREN],
  ['{', TokenKind.LEFT_BRACE],
  ['}', TokenKind.RIGHT_BRACE],
  ['[', TokenKind.LEFT_BRACKET],
  [']', TokenKind.RIGHT_BRACKET],
  [';', TokenKind.SEMICOLON],
  [',', TokenKind.COMMA],
  [':', TokenKind.COLON],
  ['.', TokenKind.DOT],
]);

/**
 * 渲染单个 token：`KIND('lexeme', line:column)`。
 */
export function formatToken(token: Token): string {
  return `${token.kind}('${token.lexeme}', ${formatLocation(token.location)})`;
}

/**
 * 每行一个 token 的文本形式，省略 END_OF_FILE。
 */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens
    .filter(t => t.kind !== TokenKind.END_OF_FILE)
    .map(formatToken)
    .join('\n');
}
