import { DataType } from '../types.js';

export interface BuiltinSignature {
  readonly name: string;
  readonly parameterTypes: readonly DataType[];
  readonly returnType: DataType;
}

/** 全局作用域中预置的内置函数；IR 中对应同名的外部声明 */
export const BUILTINS: readonly BuiltinSignature[] = [
  { name: 'print', parameterTypes: [DataType.STRING], returnType: DataType.VOID },
  { name: 'printInt', parameterTypes: [DataType.INT], returnType: DataType.VOID },
  { name: 'printFloat', parameterTypes: [DataType.FLOAT], returnType: DataType.VOID },
  { name: 'input', parameterTypes: [], returnType: DataType.STRING },
  { name: 'sqrt', parameterTypes: [DataType.FLOAT], returnType: DataType.FLOAT },
];

/** 变参格式化输出原语，仅在 IR 层声明 */
export const PRINTF = 'printf';
