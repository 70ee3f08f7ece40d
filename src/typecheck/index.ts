/**
 * @module typecheck
 *
 * 语义分析与类型检查：符号表、类型规则、内置函数表和分析器。
 */

export { SemanticAnalyzer, analyze } from './analyzer.js';
export type { AnalysisResult } from './analyzer.js';
export { SymbolTable, functionSymbol, variableSymbol } from './symbol_table.js';
export type { Symbol } from './symbol_table.js';
export { isCompatible, isNumeric, binaryResultType, unaryResultType, commonNumericType } from './type_system.js';
export { BUILTINS, PRINTF } from './builtins.js';
export type { BuiltinSignature } from './builtins.js';
