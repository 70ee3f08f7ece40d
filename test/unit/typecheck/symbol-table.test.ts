import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SymbolTable, functionSymbol, variableSymbol } from '../../../src/typecheck/symbol_table.js';
import { DataType } from '../../../src/types.js';
import { START_LOCATION } from '../../../src/frontend/location.js';

describe('符号表', () => {
  it('全局作用域深度为 0，退出全局作用域不做任何事', () => {
    const table = new SymbolTable();
    assert.equal(table.depth(), 0);
    table.exitScope();
    assert.equal(table.depth(), 0);
    table.enterScope();
    table.enterScope();
    assert.equal(table.depth(), 2);
  });

  it('同一作用域内重复定义返回 false 且保留原符号', () => {
    const table = new SymbolTable();
    const first = variableSymbol('x', DataType.INT, START_LOCATION);
    assert.equal(table.insert('x', first), true);
    assert.equal(table.insert('x', variableSymbol('x', DataType.FLOAT, START_LOCATION)), false);
    assert.equal(table.lookup('x'), first);
  });

  it('内层作用域遮蔽外层，退出后恢复', () => {
    const table = new SymbolTable();
    table.insert('x', variableSymbol('x', DataType.INT, START_LOCATION));
    table.enterScope();
    assert.equal(table.insert('x', variableSymbol('x', DataType.STRING, START_LOCATION)), true);
    assert.equal(table.lookup('x')?.type, DataType.STRING);
    table.exitScope();
    assert.equal(table.lookup('x')?.type, DataType.INT);
  });

  it('lookupCurrentScope 只查看最内层作用域', () => {
    const table = new SymbolTable();
    table.insert('g', variableSymbol('g', DataType.BOOL, START_LOCATION));
    table.enterScope();
    assert.equal(table.lookupCurrentScope('g'), undefined);
    assert.equal(table.lookup('g')?.type, DataType.BOOL);
  });

  it('replace 覆盖当前作用域中的符号', () => {
    const table = new SymbolTable();
    table.insert('x', variableSymbol('x', DataType.INT, START_LOCATION));
    const replacement = variableSymbol('x', DataType.FLOAT, START_LOCATION);
    table.replace('x', replacement);
    assert.equal(table.lookup('x'), replacement);
  });

  it('函数符号为常量并记录签名', () => {
    const fn = functionSymbol('f', [DataType.INT, DataType.BOOL], DataType.FLOAT, START_LOCATION);
    assert.equal(fn.type, DataType.FUNCTION);
    assert.equal(fn.isFunction, true);
    assert.equal(fn.isConstant, true);
    assert.deepEqual(fn.parameterTypes, [DataType.INT, DataType.BOOL]);
    assert.equal(fn.returnType, DataType.FLOAT);
  });
});
