import { DataType } from '../types.js';
import type { ParserContext } from './context.js';
import { TokenKind } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { errorAtCurrent, type Parsed } from './parser-tools.js';

/** 可书写的类型名；`function` 与 `unknown` 仅在内部使用 */
const TYPE_NAMES: ReadonlyMap<string, DataType> = new Map([
  ['int', DataType.INT],
  ['float', DataType.FLOAT],
  ['bool', DataType.BOOL],
  ['string', DataType.STRING],
  ['void', DataType.VOID],
]);

/**
 * 解析类型标注。
 *
 * 未知的类型名会记录诊断并返回 `unknown`，解析继续；
 * 缺少类型名则是语法错误。
 */
export function parseType(ctx: ParserContext): Parsed<DataType> {
  if (!ctx.check(TokenKind.IDENTIFIER)) {
    return errorAtCurrent(ctx, tok => Diagnostics.expectedType(tok.location));
  }
  const tok = ctx.advance();
  const type = TYPE_NAMES.get(tok.lexeme);
  if (type !== undefined) return type;
  ctx.sink.report(Diagnostics.unknownType(tok.lexeme, tok.location));
  return DataType.UNKNOWN;
}
