import { compile } from '../../pipeline/compile.js';
import { printDiagnostics } from '../utils/error-handler.js';
import { success } from '../utils/logger.js';
import { readSource, type VerboseOptions } from '../utils/source.js';

/**
 * 对源文件执行词法、语法与语义检查，不生成 IR。
 */
export function checkCommand(file: string, options: VerboseOptions = {}): number {
  const source = readSource(file);
  const result = compile(source, { stopAfter: 'analyze' });
  printDiagnostics(result.diagnostics, { source, ...options });
  if (!result.success) return 1;
  success(`${file}: no errors found`);
  return 0;
}
