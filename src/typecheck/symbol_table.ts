import { DataType } from '../types.js';
import type { SourceLocation } from '../types.js';

/**
 * 符号信息。变量使用 `type`；函数的 `type` 为 `function`，签名见 parameterTypes/returnType。
 */
export interface Symbol {
  readonly name: string;
  readonly type: DataType;
  readonly isFunction: boolean;
  readonly isConstant: boolean;
  readonly location: SourceLocation;
  readonly parameterTypes: readonly DataType[];
  readonly returnType: DataType;
}

export function variableSymbol(
  name: string,
  type: DataType,
  location: SourceLocation,
  isConstant = false
): Symbol {
  return { name, type, isFunction: false, isConstant, location, parameterTypes: [], returnType: DataType.VOID };
}

export function functionSymbol(
  name: string,
  parameterTypes: readonly DataType[],
  returnType: DataType,
  location: SourceLocation
): Symbol {
  return { name, type: DataType.FUNCTION, isFunction: true, isConstant: true, location, parameterTypes, returnType };
}

class Scope {
  private readonly symbols = new Map<string, Symbol>();

  define(name: string, symbol: Symbol): boolean {
    if (this.symbols.has(name)) return false;
    this.symbols.set(name, symbol);
    return true;
  }

  set(name: string, symbol: Symbol): void {
    this.symbols.set(name, symbol);
  }

  lookupLocal(name: string): Symbol | undefined {
    return this.symbols.get(name);
  }
}

/**
 * 词法作用域栈。
 *
 * 索引 0 为全局作用域（内置函数与顶层声明），永不弹出；查找由内向外进行。
 */
export class SymbolTable {
  private readonly scopes: Scope[] = [new Scope()];

  enterScope(): void {
    this.scopes.push(new Scope());
  }

  /** 在全局作用域上调用时不做任何事 */
  exitScope(): void {
    if (this.scopes.length > 1) this.scopes.pop();
  }

  /**
   * 在当前作用域定义符号。
   *
   * @returns 当前作用域已存在同名符号时返回 false，且不修改表
   */
  insert(name: string, symbol: Symbol): boolean {
    return this.current().define(name, symbol);
  }

  /** 覆盖当前作用域中的同名符号（重复声明后的尽力恢复） */
  replace(name: string, symbol: Symbol): void {
    this.current().set(name, symbol);
  }

  lookup(name: string): Symbol | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const found = this.scopes[i]?.lookupLocal(name);
      if (found) return found;
    }
    return undefined;
  }

  lookupCurrentScope(name: string): Symbol | undefined {
    return this.current().lookupLocal(name);
  }

  /** 作用域深度；全局作用域为 0 */
  depth(): number {
    return this.scopes.length - 1;
  }

  private current(): Scope {
    return this.scopes[this.scopes.length - 1] ?? this.global();
  }

  private global(): Scope {
    const root = this.scopes[0];
    if (!root) throw new Error('global scope missing');
    return root;
  }
}
