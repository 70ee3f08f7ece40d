/**
 * @module lexer
 *
 * 词法分析器：将 Cinder 源代码转换为 Token 流。
 *
 * **功能**：
 * - 识别关键字、标识符、数字与字符串字面量、运算符和分隔符
 * - 跳过空白与 `//` 行注释
 * - 跟踪每个 token 起始字符的位置信息（行号、列号、偏移）
 *
 * 词法错误不会抛出异常，而是以 ERROR token 的形式出现在输出中，
 * 由解析器统一报告。
 */

import { TokenKind } from './tokens.js';
import type { SourceLocation, Token } from '../types.js';
import { KEYWORDS, SINGLE_CHAR_TOKENS, TWO_CHAR_OPERATORS } from './tokens.js';
import { START_LOCATION, advanceLocation } from './location.js';

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/**
 * 对源代码进行词法分析，生成 Token 流。
 *
 * 该函数是全函数：任何输入都会产生以恰好一个 END_OF_FILE 结尾的有限序列。
 *
 * @example
 * ```typescript
 * import { tokenize } from 'cinder-lang';
 *
 * const tokens = tokenize('var x: int = 1;');
 * // VAR IDENTIFIER COLON IDENTIFIER ASSIGN INTEGER SEMICOLON END_OF_FILE
 * ```
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let loc: SourceLocation = START_LOCATION;

  const peek = (): string => source[i] ?? '';
  const peekAt = (offset: number): string => source[i + offset] ?? '';
  const next = (): string => {
    const ch = source[i] ?? '';
    i++;
    loc = advanceLocation(loc, ch);
    return ch;
  };

  const push = (kind: TokenKind, lexeme: string, start: SourceLocation): void => {
    tokens.push({ kind, lexeme, location: start });
  };

  while (i < source.length) {
    const ch = peek();

    if (isWhitespace(ch)) {
      next();
      continue;
    }

    // Line comments
    if (ch === '/' && peekAt(1) === '/') {
      while (i < source.length && peek() !== '\n') next();
      continue;
    }

    const start = loc;

    if (isIdentifierStart(ch)) {
      let text = '';
      while (isIdentifierPart(peek())) text += next();
      push(KEYWORDS.get(text) ?? TokenKind.IDENTIFIER, text, start);
      continue;
    }

    if (isDigit(ch)) {
      let text = '';
      let seenDot = false;
      for (;;) {
        const c = peek();
        if (isDigit(c)) {
          text += next();
        } else if (c === '.' && !seenDot) {
          seenDot = true;
          text += next();
        } else {
          break;
        }
      }
      push(seenDot ? TokenKind.FLOAT : TokenKind.INTEGER, text, start);
      continue;
    }

    if (ch === '"') {
      next();
      let text = '';
      while (i < source.length && peek() !== '"' && peek() !== '\n') text += next();
      if (peek() === '"') {
        next();
        push(TokenKind.STRING, text, start);
      } else {
        // 停在换行符之前，后续行照常扫描
        push(TokenKind.ERROR, 'Unterminated string', start);
      }
      continue;
    }

    const two = TWO_CHAR_OPERATORS.get(ch + peekAt(1));
    if (two !== undefined) {
      const text = next() + next();
      push(two, text, start);
      continue;
    }

    const single = SINGLE_CHAR_TOKENS.get(ch);
    if (single !== undefined) {
      push(single, next(), start);
      continue;
    }

    next();
    push(TokenKind.ERROR, `Unexpected character: ${ch}`, start);
  }

  push(TokenKind.END_OF_FILE, '', loc);
  return tokens;
}

/** 是否包含词法错误 token */
export function hasLexicalErrors(tokens: readonly Token[]): boolean {
  return tokens.some(t => t.kind === TokenKind.ERROR);
}
