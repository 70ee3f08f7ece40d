import { tokenize } from '../../frontend/lexer.js';
import { formatTokens } from '../../frontend/tokens.js';
import { parse } from '../../parser.js';
import { DiagnosticSink } from '../../diagnostics/diagnostics.js';
import { printDiagnostics } from '../utils/error-handler.js';
import { readSource, type VerboseOptions } from '../utils/source.js';

/**
 * 输出源文件的词法单元序列（每行一个，不含 EOF）。
 *
 * 存在词法错误时同时输出对应诊断，退出码为 1。
 */
export function tokensCommand(file: string, options: VerboseOptions = {}): number {
  const source = readSource(file);
  const tokens = tokenize(source);
  const listing = formatTokens(tokens);
  if (listing) console.log(listing);

  const sink = new DiagnosticSink();
  const { success } = parse(tokens, sink);
  if (!success && sink.hasErrors()) {
    const lexical = sink.getDiagnostics().filter(d => d.code.startsWith('L'));
    if (lexical.length > 0) {
      printDiagnostics(lexical, { source, ...options });
      return 1;
    }
  }
  return 0;
}
