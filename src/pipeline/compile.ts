/**
 * @module pipeline/compile
 *
 * 编译管道驱动：tokenize → parse → analyze → generate。
 *
 * 所有阶段共享一个诊断收集器；前一阶段失败时后续阶段跳过，对应的结果为 null。
 */

import type { IR, Program, Token } from '../types.js';
import { tokenize } from '../frontend/lexer.js';
import { parse } from '../parser.js';
import { analyze } from '../typecheck/analyzer.js';
import { generate } from '../lower_to_ir.js';
import { DiagnosticSink, type Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger, logPerformance } from '../utils/logger.js';

const logger = createLogger('pipeline');

export type CompileStage = 'parse' | 'analyze' | 'generate';

export interface CompileOptions {
  /** IR 模块名 */
  moduleName?: string;
  /** 合成顶层函数名 */
  toplevelName?: string;
  /** 在指定阶段之后停止 */
  stopAfter?: CompileStage;
}

/** 各阶段的执行结果；null 表示该阶段未执行 */
export interface StageResults {
  parse: boolean;
  analyze: boolean | null;
  generate: boolean | null;
}

export interface CompileResult {
  tokens: Token[];
  program: Program;
  module: IR.Module | null;
  /** 合成顶层函数名（未生成 IR 或没有顶层语句时为 null） */
  toplevel: string | null;
  diagnostics: Diagnostic[];
  stages: StageResults;
  /** 所有已请求阶段均执行且成功 */
  success: boolean;
}

/**
 * 编译一段源代码。
 *
 * @example
 * ```typescript
 * const result = compile('function main(): int { return 1; }');
 * if (result.module) console.log(formatModule(result.module));
 * ```
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const sink = new DiagnosticSink();
  const stopAfter = options.stopAfter ?? 'generate';
  const start = performance.now();

  const tokens = logger.time('tokenize', () => tokenize(source), t => ({ tokens: t.length }));
  const parsed = logger.time(
    'parse',
    () => parse(tokens, sink),
    p => ({ statements: p.program.statements.length })
  );

  const result: CompileResult = {
    tokens,
    program: parsed.program,
    module: null,
    toplevel: null,
    diagnostics: [],
    stages: { parse: parsed.success, analyze: null, generate: null },
    success: false,
  };

  if (parsed.success && stopAfter !== 'parse') {
    const analysis = logger.time(
      'analyze',
      () => analyze(parsed.program, sink),
      a => ({ diagnostics: a.diagnostics.length })
    );
    result.stages.analyze = analysis.success;

    if (analysis.success && stopAfter === 'generate') {
      const generated = logger.time(
        'generate',
        () =>
          generate(parsed.program, sink, {
            ...(options.moduleName !== undefined ? { moduleName: options.moduleName } : {}),
            ...(options.toplevelName !== undefined ? { toplevelName: options.toplevelName } : {}),
          }),
        g => ({ functions: g.module.functions.length })
      );
      result.module = generated.module;
      result.toplevel = generated.toplevel;
      result.stages.generate = generated.success;
    }
  }

  result.diagnostics = sink.getDiagnostics();
  const requested: Array<boolean | null> =
    stopAfter === 'parse'
      ? [result.stages.parse]
      : stopAfter === 'analyze'
        ? [result.stages.parse, result.stages.analyze]
        : [result.stages.parse, result.stages.analyze, result.stages.generate];
  result.success = requested.every(s => s === true);

  logPerformance({
    component: 'pipeline',
    operation: 'compile',
    duration: performance.now() - start,
    metadata: {
      success: result.success,
      errors: sink.errorCount(),
    },
  });
  return result;
}
