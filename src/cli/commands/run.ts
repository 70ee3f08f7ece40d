import { readFileSync } from 'node:fs';
import { compile } from '../../pipeline/compile.js';
import { execute, type GlobalStore } from '../../ir/interpreter.js';
import { printDiagnostics } from '../utils/error-handler.js';
import { error as logError, info } from '../utils/logger.js';
import { readSource, type VerboseOptions } from '../utils/source.js';

export interface RunOptions extends VerboseOptions {
  /** 入口函数名（默认先运行顶层语句，再运行 main） */
  entry?: string;
  /** input() 读取的输入文件，每行一次 */
  inputFile?: string;
}

/**
 * 编译源文件并用 IR 解释器执行入口函数。
 *
 * 程序输出写到 stdout；非 void 的返回值以 info 行输出。
 * 各入口共享同一份全局变量存储。
 */
export function runCommand(file: string, options: RunOptions = {}): number {
  const source = readSource(file);
  const result = compile(source);
  printDiagnostics(result.diagnostics, { source, ...options });
  if (!result.module || !result.success) return 1;

  const module = result.module;
  const defined = (name: string): boolean => module.functions.some(fn => fn.name === name && !fn.external);
  // 默认先执行顶层语句，再执行 main
  const entries = options.entry
    ? [options.entry]
    : [result.toplevel, defined('main') ? 'main' : null].filter((name): name is string => name !== null);
  if (entries.length === 0) {
    logError('没有可执行的入口：未定义 main 且不存在顶层语句');
    return 1;
  }

  const input = options.inputFile ? readFileSync(options.inputFile, 'utf8').split(/\r?\n/) : [];
  // 顶层语句写入的全局变量对随后运行的 main 可见
  const globals: GlobalStore = new Map();
  for (const entry of entries) {
    if (!defined(entry)) {
      logError(`入口函数不存在：${entry}`);
      return 1;
    }
    const evaluation = execute(module, entry, [], { input, globals });
    if (evaluation.output) console.log(evaluation.output.replace(/\n$/, ''));
    if (!evaluation.success) {
      logError(`运行时错误：${evaluation.error ?? 'unknown'}`);
      return 1;
    }
    if (evaluation.value !== undefined) info(`${entry} returned ${String(evaluation.value)}`);
  }
  return 0;
}
