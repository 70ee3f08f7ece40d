/**
 * @module ir
 *
 * 低层 IR：构造工具、文本打印、JSON 封装、结构校验与解释器。
 */

export { FunctionBuilder, Values, externalFunction, isTerminator, terminatorOf, zeroValue } from './ir.js';
export { formatModule, formatFunction, formatType } from './pretty_ir.js';
export { serializeModule, deserializeModule, isValidModuleJson } from './ir_json.js';
export type { IREnvelope } from './ir_json.js';
export { verifyModule, verifyFunction } from './verify.js';
export type { VerifyIssue } from './verify.js';
export { execute } from './interpreter.js';
export type { EvalResult, ExecuteOptions, GlobalStore, RuntimeArgument, RuntimeValue } from './interpreter.js';
