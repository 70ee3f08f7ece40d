/**
 * @module cinder-lang
 *
 * Cinder 编译器的主要 API 接口。
 *
 * Cinder 是一种小型静态类型命令式语言（函数、带类型的变量、if/while、内置函数）。
 * 编译器管道包括：
 *
 * **编译管道**：
 * ```
 * 源代码 → tokenize → parse → AST → analyze → generate → IR 模块 → 打印 / 解释执行
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { compile, formatModule, execute } from 'cinder-lang';
 *
 * const result = compile('function main(): int { var x: int = 2 + 3 * 4; return x; }');
 * if (result.module) {
 *   console.log(formatModule(result.module));
 *   console.log(execute(result.module, 'main').value); // 14
 * }
 * ```
 */

// 编译器管道函数
export { tokenize, hasLexicalErrors, formatToken, formatTokens, formatLocation } from './frontend/index.js';
export { parse } from './parser.js';
export type { ParseResult } from './parser.js';
export { analyze, SemanticAnalyzer, SymbolTable, variableSymbol, functionSymbol, BUILTINS } from './typecheck/index.js';
export type { AnalysisResult, Symbol, BuiltinSignature } from './typecheck/index.js';
export { generate, IRGenerator, toIRType } from './lower_to_ir.js';
export type { GenerateOptions, GenerateResult } from './lower_to_ir.js';
export { compile } from './pipeline/compile.js';
export type { CompileOptions, CompileResult, CompileStage, StageResults } from './pipeline/compile.js';

// 核心类型和枚举
export { TokenKind, DataType } from './types.js';
export type * from './types.js';

// AST
export { Node, visitExpression, visitStatement } from './ast/index.js';
export type { AstVisitor } from './ast/index.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticBuilder,
  DiagnosticSink,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/index.js';
export type { Diagnostic } from './diagnostics/index.js';

// IR 工具
export {
  formatModule,
  formatFunction,
  serializeModule,
  deserializeModule,
  isValidModuleJson,
  verifyModule,
  verifyFunction,
  execute,
} from './ir/index.js';
export type { EvalResult, ExecuteOptions, GlobalStore, IREnvelope, VerifyIssue } from './ir/index.js';

// 配置与日志
export { ConfigService } from './config/config-service.js';
export { createLogger, logPerformance, LogLevel } from './utils/logger.js';
