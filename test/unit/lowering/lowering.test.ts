import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { tokenize } from '../../../src/frontend/lexer.js';
import { parse } from '../../../src/parser.js';
import { analyze } from '../../../src/typecheck/analyzer.js';
import { generate, toIRType, type GenerateResult } from '../../../src/lower_to_ir.js';
import { formatFunction, formatModule } from '../../../src/ir/pretty_ir.js';
import { verifyModule } from '../../../src/ir/verify.js';
import { DataType } from '../../../src/types.js';
import type { IR, Program } from '../../../src/types.js';

function checked(source: string): Program {
  const parsed = parse(tokenize(source));
  assert.equal(parsed.success, true, parsed.diagnostics.map(d => d.message).join('; '));
  const analysis = analyze(parsed.program);
  assert.equal(analysis.success, true, analysis.diagnostics.map(d => d.message).join('; '));
  return parsed.program;
}

function lower(source: string): GenerateResult {
  return generate(checked(source));
}

function fn(result: GenerateResult, name: string): IR.Function {
  const found = result.module.functions.find(f => f.name === name);
  assert.ok(found, `function ${name} not found`);
  return found;
}

function text(source: string, name: string): string {
  return formatFunction(fn(lower(source), name));
}

describe('IR 降级', () => {
  it('数据类型映射到 IR 类型', () => {
    assert.deepEqual(
      [DataType.VOID, DataType.INT, DataType.FLOAT, DataType.BOOL, DataType.STRING, DataType.UNKNOWN].map(toIRType),
      ['void', 'i32', 'f64', 'i1', 'ptr', 'i32']
    );
  });

  it('顶层语句进入合成函数，运算按优先级求值', () => {
    const result = lower('var x: int = 2 + 3 * 4;');
    assert.equal(result.success, true);
    assert.equal(result.toplevel, '__toplevel');
    assert.deepEqual(result.diagnostics, []);
    assert.equal(
      formatFunction(fn(result, '__toplevel')),
      [
        'define void @__toplevel() {',
        'entry:',
        '  %0 = mul i32 3, 4',
        '  %1 = add i32 2, %0',
        '  store i32 %1, ptr @x',
        '  ret void',
        '}',
      ].join('\n')
    );
  });

  it('模块声明全局变量、内置函数与变参 printf', () => {
    const result = lower('var x: int = 2 + 3 * 4;');
    assert.equal(
      formatModule(result.module).split('\n').slice(0, 11).join('\n'),
      [
        "; ModuleID = 'main'",
        '',
        '@x = global i32 0',
        '',
        'declare void @print(ptr)',
        'declare void @printInt(i32)',
        'declare void @printFloat(double)',
        'declare ptr @input()',
        'declare double @sqrt(double)',
        'declare i32 @printf(ptr, ...)',
        '',
      ].join('\n')
    );
  });

  it('两个分支都返回时删除不可达的合并块', () => {
    const result = lower('function f(x: int): int { if (x > 0) { return 1; } else { return 2; } }');
    assert.deepEqual(result.diagnostics, []);
    const f = fn(result, 'f');
    assert.equal(f.blocks.length, 3);
    assert.equal(
      formatFunction(f),
      [
        'define i32 @f(i32 %x) {',
        'entry:',
        '  %x.addr = alloca i32',
        '  store i32 %x, ptr %x.addr',
        '  %0 = load i32, ptr %x.addr',
        '  %1 = icmp sgt i32 %0, 0',
        '  br i1 %1, label %then, label %else',
        'then:',
        '  ret i32 1',
        'else:',
        '  ret i32 2',
        '}',
      ].join('\n')
    );
  });

  it('while 循环生成 loop/while_body/while_cont 与回边', () => {
    const source = 'function count(n: int): int { var i: int = 0; while (i < n) { i = i + 1; } return i; }';
    const f = fn(lower(source), 'count');
    assert.equal(
      formatFunction(f),
      [
        'define i32 @count(i32 %n) {',
        'entry:',
        '  %n.addr = alloca i32',
        '  %i.addr = alloca i32',
        '  store i32 %n, ptr %n.addr',
        '  store i32 0, ptr %i.addr',
        '  br label %loop',
        'loop:',
        '  %0 = load i32, ptr %i.addr',
        '  %1 = load i32, ptr %n.addr',
        '  %2 = icmp slt i32 %0, %1',
        '  br i1 %2, label %while_body, label %while_cont',
        'while_body:',
        '  %3 = load i32, ptr %i.addr',
        '  %4 = add i32 %3, 1',
        '  store i32 %4, ptr %i.addr',
        '  br label %loop',
        'while_cont:',
        '  %5 = load i32, ptr %i.addr',
        '  ret i32 %5',
        '}',
      ].join('\n')
    );
    assert.deepEqual(
      f.blocks.map(b => b.successors),
      [[1], [2, 3], [1], []]
    );
  });

  it('可能缺少返回值时发出 G004 警告并补零返回', () => {
    const result = lower('function f(b: bool): int { if (b) { return 1; } }');
    assert.equal(result.success, true);
    assert.deepEqual(
      result.diagnostics.map(d => [d.severity, d.code, d.message]),
      [['warning', 'G004', 'Function f may reach end without returning a value']]
    );
    const f = fn(result, 'f');
    assert.deepEqual(f.blocks[f.blocks.length - 1]?.instructions, [
      { op: 'ret', value: { kind: 'ConstInt', type: 'i32', value: 0 } },
    ]);
  });

  it('int 与 float 相遇处插入转换', () => {
    assert.equal(
      text('function h(): float { var i: int = 2; return i * 1.5; }', 'h'),
      [
        'define double @h() {',
        'entry:',
        '  %i.addr = alloca i32',
        '  store i32 2, ptr %i.addr',
        '  %0 = load i32, ptr %i.addr',
        '  %1 = sitofp i32 %0 to double',
        '  %2 = fmul double %1, 1.5',
        '  ret double %2',
        '}',
      ].join('\n')
    );
    assert.equal(
      text('function t(): int { return 2.5; }', 't'),
      ['define i32 @t() {', 'entry:', '  %0 = fptosi double 2.5 to i32', '  ret i32 %0', '}'].join('\n')
    );
  });

  it('混合类型比较使用 fcmp', () => {
    assert.equal(
      text('var b: bool = 1 < 2.0;', '__toplevel').split('\n').slice(2, 4).join('\n'),
      ['  %0 = sitofp i32 1 to double', '  %1 = fcmp olt double %0, 2.0'].join('\n')
    );
  });

  it('一元与逻辑运算', () => {
    const lines = text('function u(x: int, b: bool): bool { var y: int = -x; return !b && b; }', 'u').split('\n');
    assert.ok(lines.includes('  %1 = sub i32 0, %0'));
    assert.ok(lines.includes('  %3 = xor i1 %2, true'));
    assert.ok(lines.includes('  %5 = and i1 %3, %4'));
  });

  it('void 调用没有结果值', () => {
    assert.equal(
      text('print("hi");', '__toplevel'),
      ['define void @__toplevel() {', 'entry:', '  call void @print(ptr c"hi")', '  ret void', '}'].join('\n')
    );
  });

  it('return 之后的语句不降级', () => {
    const f = fn(lower('function f(): int { return 1; printInt(2); }'), 'f');
    assert.equal(f.blocks.length, 1);
    assert.deepEqual(f.blocks[0]?.instructions.map(i => i.op), ['ret']);
  });

  it('块标签与槽名在函数内唯一', () => {
    const f = fn(lower('{ var x = 1; }\n{ var x = 2; }\nif (true) {}\nif (false) {}'), '__toplevel');
    assert.deepEqual(
      f.slots.map(s => s.name),
      ['x', 'x.1']
    );
    assert.deepEqual(
      f.blocks.map(b => b.label),
      ['entry', 'then', 'else', 'ifcont', 'then1', 'else1', 'ifcont1']
    );
  });

  it('所有 alloca 位于入口块', () => {
    const f = fn(lower('function f(b: bool) { while (b) { var t: int = 1; } }'), 'f');
    const allocas = f.blocks.map(b => b.instructions.filter(i => i.op === 'alloca').length);
    assert.deepEqual(allocas, [2, 0, 0, 0]);
  });

  it('顶层函数名与用户函数冲突时追加下划线', () => {
    const result = lower('function __toplevel() {}\nprintInt(1);');
    assert.equal(result.toplevel, '__toplevel_');
    assert.deepEqual(
      result.module.functions.filter(f => !f.external).map(f => f.name),
      ['__toplevel', '__toplevel_']
    );
  });

  it('顶层变量降级为全局变量，函数体通过 gload/gstore 访问', () => {
    const result = lower('var g: int = 1;\nfunction inc(): int { g = g + 1; return g; }\ng = inc();');
    assert.equal(result.success, true);
    assert.deepEqual(result.module.globals, [
      { name: 'g', type: 'i32', initializer: { kind: 'ConstInt', type: 'i32', value: 0 } },
    ]);
    assert.equal(
      formatFunction(fn(result, 'inc')),
      [
        'define i32 @inc() {',
        'entry:',
        '  %0 = load i32, ptr @g',
        '  %1 = add i32 %0, 1',
        '  store i32 %1, ptr @g',
        '  %2 = load i32, ptr @g',
        '  ret i32 %2',
        '}',
      ].join('\n')
    );
    assert.equal(
      formatFunction(fn(result, '__toplevel')),
      [
        'define void @__toplevel() {',
        'entry:',
        '  store i32 1, ptr @g',
        '  %0 = call i32 @inc()',
        '  store i32 %0, ptr @g',
        '  ret void',
        '}',
      ].join('\n')
    );
    assert.deepEqual(verifyModule(result.module), []);
  });

  it('局部声明遮蔽全局变量', () => {
    const lines = text('var g = 1;\nfunction f(): int { var g = 2; return g; }', 'f').split('\n');
    assert.ok(lines.includes('  %0 = load i32, ptr %g.addr'));
  });

  it('块内的顶层声明仍是顶层函数的栈槽', () => {
    const result = lower('{ var t = 1; }');
    assert.deepEqual(result.module.globals, []);
    assert.deepEqual(fn(result, '__toplevel').slots.map(s => s.name), ['t']);
  });

  it('全局变量与函数同名时追加下划线', () => {
    const result = lower('var printf = 1;\nvar __toplevel = 2;');
    assert.deepEqual(
      result.module.globals.map(g => g.name),
      ['printf_', '__toplevel']
    );
    assert.equal(result.toplevel, '__toplevel_');
    assert.deepEqual(verifyModule(result.module), []);
  });

  it('没有顶层语句时不生成合成函数', () => {
    const result = lower('function main(): int { return 0; }');
    assert.equal(result.toplevel, null);
    assert.deepEqual(
      result.module.functions.filter(f => !f.external).map(f => f.name),
      ['main']
    );
  });

  it('可以指定模块名与顶层函数名', () => {
    const result = generate(checked('printInt(1);'), undefined, { moduleName: 'demo', toplevelName: 'start' });
    assert.equal(result.module.name, 'demo');
    assert.equal(result.toplevel, 'start');
  });

  it('生成的模块通过结构校验', () => {
    const result = lower(
      'function fib(n: int): int { if (n < 2) { return n; } return fib(n - 1) + fib(n - 2); }\nprintInt(fib(10));'
    );
    assert.deepEqual(verifyModule(result.module), []);
  });
});

describe('IR 降级错误', () => {
  it('未解析的变量与函数报告 G001/G002 并置失败', () => {
    const program = parse(tokenize('x;\nfoo();')).program;
    const result = generate(program);
    assert.equal(result.success, false);
    assert.deepEqual(
      result.diagnostics.map(d => [d.code, d.message]),
      [
        ['G001', 'Undefined variable: x'],
        ['G002', 'Undefined function: foo'],
      ]
    );
  });

  it('void 值用作操作数报告 G003', () => {
    const program = parse(tokenize('var y = print("a");')).program;
    const result = generate(program);
    assert.equal(result.success, false);
    assert.deepEqual(
      result.diagnostics.map(d => [d.code, d.message]),
      [['G003', 'Failed to generate operand: void value used in expression']]
    );
  });
});
