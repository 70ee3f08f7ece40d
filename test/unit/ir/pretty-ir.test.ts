import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FunctionBuilder, Values, externalFunction } from '../../../src/ir/ir.js';
import { formatFunction, formatModule, formatType } from '../../../src/ir/pretty_ir.js';

describe('IR 文本打印', () => {
  it('f64 打印为 double', () => {
    assert.deepEqual((['void', 'i32', 'f64', 'i1', 'ptr'] as const).map(formatType), ['void', 'i32', 'double', 'i1', 'ptr']);
  });

  it('外部函数打印为 declare', () => {
    assert.equal(
      formatFunction(externalFunction('printf', [{ name: 'format', type: 'ptr' }], 'i32', true)),
      'declare i32 @printf(ptr, ...)'
    );
    assert.equal(formatFunction(externalFunction('sqrt', [{ name: 'arg0', type: 'f64' }], 'f64')), 'declare double @sqrt(double)');
  });

  it('字符串常量转义引号与控制字符', () => {
    const b = new FunctionBuilder('main', [], 'void');
    b.emit({ op: 'call', callee: 'print', args: [Values.string('a"b\n')], returnType: 'void', result: null });
    b.terminate({ op: 'ret', value: null });
    assert.equal(
      formatFunction(b.build()),
      ['define void @main() {', 'entry:', '  call void @print(ptr c"a\\22b\\0A")', '  ret void', '}'].join('\n')
    );
  });

  it('浮点常量总带小数部分，布尔常量打印为 true/false', () => {
    const b = new FunctionBuilder('k', [], 'f64');
    const flag = b.allocateSlot('flag', 'i1');
    b.emit({ op: 'store', slot: flag.id, value: Values.bool(true) });
    b.terminate({ op: 'ret', value: Values.float(3) });
    assert.equal(
      formatFunction(b.build()),
      [
        'define double @k() {',
        'entry:',
        '  %flag.addr = alloca i1',
        '  store i1 true, ptr %flag.addr',
        '  ret double 3.0',
        '}',
      ].join('\n')
    );
  });

  it('全局变量与 gload/gstore', () => {
    const b = new FunctionBuilder('tick', [], 'void');
    const value = b.newTemp('f64');
    b.emit({ op: 'gload', result: value, global: 'rate' });
    b.emit({ op: 'gstore', global: 'rate', value });
    b.terminate({ op: 'ret', value: null });
    assert.equal(
      formatModule({
        name: 'g',
        globals: [{ name: 'rate', type: 'f64', initializer: Values.float(0) }],
        functions: [b.build()],
      }),
      [
        "; ModuleID = 'g'",
        '',
        '@rate = global double 0.0',
        '',
        'define void @tick() {',
        'entry:',
        '  %0 = load double, ptr @rate',
        '  store double %0, ptr @rate',
        '  ret void',
        '}',
        '',
      ].join('\n')
    );
  });

  it('模块文本以换行结尾且只含头部时没有声明段', () => {
    assert.equal(formatModule({ name: 'empty', globals: [], functions: [] }), "; ModuleID = 'empty'\n");
  });
});
