import { DataType } from '../types.js';
import type { BinaryOperator, UnaryOperator } from '../types.js';

const ARITHMETIC: ReadonlySet<BinaryOperator> = new Set(['+', '-', '*', '/', '%']);
const COMPARISON: ReadonlySet<BinaryOperator> = new Set(['==', '!=', '<', '<=', '>', '>=']);

export function isNumeric(type: DataType): boolean {
  return type === DataType.INT || type === DataType.FLOAT;
}

/** 两个数值操作数统一后的类型 */
export function commonNumericType(left: DataType, right: DataType): DataType {
  return left === DataType.FLOAT || right === DataType.FLOAT ? DataType.FLOAT : DataType.INT;
}

/**
 * 类型兼容性：相等、任一方为 unknown、或 int/float 互相（隐式数值转换）。
 *
 * 该关系对称且自反。
 */
export function isCompatible(from: DataType, to: DataType): boolean {
  if (from === to) return true;
  if (from === DataType.UNKNOWN || to === DataType.UNKNOWN) return true;
  return isNumeric(from) && isNumeric(to);
}

/**
 * 二元运算的结果类型；组合非法时返回 null。
 *
 * 调用方需先处理 unknown 操作数（静默传播 unknown，不重复报告）。
 */
export function binaryResultType(op: BinaryOperator, left: DataType, right: DataType): DataType | null {
  if (ARITHMETIC.has(op)) {
    return isNumeric(left) && isNumeric(right) ? commonNumericType(left, right) : null;
  }
  // 比较与相等运算对任意已检查的操作数都产生 bool
  if (COMPARISON.has(op)) return DataType.BOOL;
  // && ||
  return left === DataType.BOOL && right === DataType.BOOL ? DataType.BOOL : null;
}

/** 一元运算的结果类型；`-` 保留数值类型，`!` 需要 bool。非法时返回 null。 */
export function unaryResultType(op: UnaryOperator, operand: DataType): DataType | null {
  if (op === '-') return isNumeric(operand) ? operand : null;
  return operand === DataType.BOOL ? DataType.BOOL : null;
}

