/**
 * @module frontend
 *
 * 编译器前端模块：位置跟踪与词法分析。
 */

export { tokenize, hasLexicalErrors } from './lexer.js';
export { TokenKind, KEYWORDS, formatToken, formatTokens } from './tokens.js';
export { START_LOCATION, advanceLocation, formatLocation, pointSpan } from './location.js';
