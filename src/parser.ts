/**
 * Cinder Language Parser - 主入口
 * 负责协调各个子模块完成整个程序的解析
 */

import { Node } from './ast/ast.js';
import type { Program, Token } from './types.js';
import { TokenKind } from './frontend/tokens.js';
import { DiagnosticSink, Diagnostics, type Diagnostic } from './diagnostics/diagnostics.js';
import { createParserContext } from './parser/context.js';
import { parseStatementList } from './parser/stmt-parser.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('parser');

/**
 * 解析结果
 *
 * 包含尽可能完整的程序 AST 和解析过程中收集的诊断信息。
 * 即使存在语法错误，也会返回已成功解析的语句。
 */
export interface ParseResult {
  /** 部分或完整的程序 AST */
  program: Program;
  /** 本次解析收集的诊断（错误/警告） */
  diagnostics: Diagnostic[];
  success: boolean;
}

/**
 * 解析标记流生成 AST
 *
 * 若标记流中存在 ERROR 标记，则逐个报告为词法诊断并返回空程序，不解析任何语句。
 *
 * @param tokens 词法标记数组（通常来自 tokenize）
 * @param sink 可选的诊断收集器；省略时使用新的收集器
 * @returns 解析结果（AST + 诊断信息）
 */
export function parse(tokens: readonly Token[], sink: DiagnosticSink = new DiagnosticSink()): ParseResult {
  const before = sink.size;
  const lexicalErrors = tokens.filter(t => t.kind === TokenKind.ERROR);

  if (lexicalErrors.length > 0) {
    for (const tok of lexicalErrors) {
      sink.report(
        tok.lexeme === 'Unterminated string'
          ? Diagnostics.unterminatedString(tok.location)
          : Diagnostics.unexpectedCharacter(tok.lexeme, tok.location)
      );
    }
    logger.debug('Parsing skipped due to lexical errors', { errors: lexicalErrors.length });
    return { program: Node.Program([]), diagnostics: sink.getDiagnostics().slice(before), success: false };
  }

  const ctx = createParserContext(tokens, sink);
  const statements = parseStatementList(ctx, null);
  const diagnostics = sink.getDiagnostics().slice(before);
  logger.debug('Parsing finished', { statements: statements.length, diagnostics: diagnostics.length });

  return {
    program: Node.Program(statements),
    diagnostics,
    success: diagnostics.length === 0,
  };
}
