import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FunctionBuilder, Values, terminatorOf, zeroValue } from '../../../src/ir/ir.js';

describe('函数构建器', () => {
  it('常量构造器与零值', () => {
    assert.deepEqual(Values.int(2 ** 31), { kind: 'ConstInt', type: 'i32', value: -2147483648 });
    assert.deepEqual(Values.bool(true), { kind: 'ConstInt', type: 'i1', value: 1 });
    assert.deepEqual(zeroValue('f64'), { kind: 'ConstFloat', type: 'f64', value: 0 });
    assert.deepEqual(zeroValue('ptr'), { kind: 'ConstString', type: 'ptr', value: '' });
    assert.equal(zeroValue('void'), null);
  });

  it('向已终结的基本块追加指令会抛出', () => {
    const b = new FunctionBuilder('f', [], 'void');
    b.terminate({ op: 'ret', value: null });
    assert.throws(() => b.emit({ op: 'store', slot: 0, value: Values.int(1) }), /terminated block entry/);
    assert.throws(() => b.terminate({ op: 'ret', value: null }), /already terminated/);
  });

  it('终结指令记录后继，condbr 两目标相同时只记录一次', () => {
    const b = new FunctionBuilder('f', [], 'void');
    const next = b.createBlock('next');
    b.terminate({ op: 'condbr', condition: Values.bool(true), ifTrue: next.id, ifFalse: next.id });
    assert.deepEqual(b.entryBlock.successors, [1]);
    assert.deepEqual(terminatorOf(b.entryBlock), { op: 'condbr', condition: Values.bool(true), ifTrue: 1, ifFalse: 1 });
  });

  it('删除不可达块并重新编号分支目标', () => {
    const b = new FunctionBuilder('f', [], 'void');
    const dead = b.createBlock('dead');
    const live = b.createBlock('live');
    b.terminate({ op: 'br', target: live.id });
    b.setInsertPoint(dead);
    b.terminate({ op: 'br', target: live.id });
    b.setInsertPoint(live);
    b.terminate({ op: 'ret', value: null });

    b.pruneUnreachable();
    const fn = b.build();
    assert.deepEqual(
      fn.blocks.map(block => [block.id, block.label, block.successors]),
      [
        [0, 'entry', [1]],
        [1, 'live', []],
      ]
    );
    assert.deepEqual(terminatorOf(fn.blocks[0] ?? b.entryBlock), { op: 'br', target: 1 });
  });

  it('同名槽位加序号后缀，alloca 集中在入口块开头', () => {
    const b = new FunctionBuilder('f', [], 'void');
    const first = b.allocateSlot('x', 'i32');
    b.emit({ op: 'store', slot: first.id, value: Values.int(1) });
    const second = b.allocateSlot('x', 'f64');
    assert.equal(second.name, 'x.1');
    assert.deepEqual(
      b.entryBlock.instructions.map(i => i.op),
      ['alloca', 'alloca', 'store']
    );
  });
});
