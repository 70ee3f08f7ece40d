import { compile } from '../../pipeline/compile.js';
import { printDiagnostics } from '../utils/error-handler.js';
import { readSource, type VerboseOptions } from '../utils/source.js';

/**
 * 解析源文件并以 JSON 输出 AST。语法错误时仍输出已恢复的部分 AST。
 */
export function parseCommand(file: string, options: VerboseOptions = {}): number {
  const source = readSource(file);
  const result = compile(source, { stopAfter: 'parse' });
  console.log(JSON.stringify(result.program, null, 2));
  printDiagnostics(result.diagnostics, { source, ...options });
  return result.success ? 0 : 1;
}
