import type { Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { START_LOCATION } from '../frontend/location.js';
import { ConfigService } from '../config/config-service.js';
import type { DiagnosticSink } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';

/**
 * Parser 上下文接口
 * 包含词法标记流、游标位置与诊断收集器
 */
export interface ParserContext {
  readonly tokens: readonly Token[];
  index: number;
  readonly sink: DiagnosticSink;
  /** 当前是否位于块语句内部（影响同步点） */
  blockDepth: number;
  debug: { enabled: boolean; depth: number; log(message: string): void };
  /** 查看当前 Token（不消费） */
  peek(): Token;
  /** 最近一次消费的 Token；尚未消费时返回第一个 Token */
  previous(): Token;
  /** 消费当前 Token 并前进；到达 END_OF_FILE 后不再前进 */
  advance(): Token;
  check(kind: TokenKind): boolean;
  /** 当前 Token 属于给定种类之一时消费它 */
  match(...kinds: TokenKind[]): boolean;
  isAtEnd(): boolean;
}

const parserLogger = createLogger('parser');

/**
 * 保证 Token 流以 END_OF_FILE 结尾。
 */
function withEndOfFile(tokens: readonly Token[]): readonly Token[] {
  const last = tokens[tokens.length - 1];
  if (last && last.kind === TokenKind.END_OF_FILE) return tokens;
  const location = last ? last.location : START_LOCATION;
  return [...tokens, { kind: TokenKind.END_OF_FILE, lexeme: '', location }];
}

export function createParserContext(tokens: readonly Token[], sink: DiagnosticSink): ParserContext {
  const stream = withEndOfFile(tokens);
  const eof = (): Token => {
    const last = stream[stream.length - 1];
    if (!last) throw new Error('token stream is empty');
    return last;
  };

  const ctx: ParserContext = {
    tokens: stream,
    index: 0,
    sink,
    blockDepth: 0,
    debug: {
      enabled: ConfigService.getInstance().debugParser,
      depth: 0,
      log: (message: string): void => {
        if (!ctx.debug.enabled) return;
        parserLogger.debug(message, { depth: ctx.debug.depth, index: ctx.index });
      },
    },
    peek: (): Token => ctx.tokens[ctx.index] ?? eof(),
    previous: (): Token => ctx.tokens[ctx.index - 1] ?? ctx.peek(),
    advance: (): Token => {
      if (!ctx.isAtEnd()) ctx.index++;
      return ctx.previous();
    },
    check: (kind: TokenKind): boolean => ctx.peek().kind === kind,
    match: (...kinds: TokenKind[]): boolean => {
      if (kinds.some(kind => ctx.check(kind))) {
        ctx.advance();
        return true;
      }
      return false;
    },
    isAtEnd: (): boolean => ctx.peek().kind === TokenKind.END_OF_FILE,
  };
  return ctx;
}
