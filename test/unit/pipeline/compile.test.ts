import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { compile } from '../../../src/pipeline/compile.js';
import { formatFunction } from '../../../src/ir/pretty_ir.js';
import { TokenKind } from '../../../src/types.js';

function codes(source: string, stopAfter?: 'parse' | 'analyze' | 'generate'): string[] {
  return compile(source, stopAfter ? { stopAfter } : {}).diagnostics.map(d => d.code);
}

describe('编译管道', () => {
  it('完整编译生成模块与顶层函数', () => {
    const result = compile('var x: int = 2 + 3 * 4;');
    assert.equal(result.success, true);
    assert.deepEqual(result.stages, { parse: true, analyze: true, generate: true });
    assert.equal(result.toplevel, '__toplevel');
    assert.ok(result.module);
    assert.equal(result.module.name, 'main');
    assert.equal(result.tokens[result.tokens.length - 1]?.kind, TokenKind.END_OF_FILE);
  });

  it('stopAfter 控制执行到哪个阶段', () => {
    const parsed = compile('var x = 1;', { stopAfter: 'parse' });
    assert.equal(parsed.success, true);
    assert.deepEqual(parsed.stages, { parse: true, analyze: null, generate: null });
    assert.equal(parsed.module, null);

    const analyzed = compile('var x = 1;', { stopAfter: 'analyze' });
    assert.equal(analyzed.success, true);
    assert.deepEqual(analyzed.stages, { parse: true, analyze: true, generate: null });
    assert.equal(analyzed.toplevel, null);
  });

  it('stopAfter parse 时不报告语义错误', () => {
    assert.deepEqual(codes('y = 1;', 'parse'), []);
    assert.deepEqual(codes('y = 1;', 'analyze'), ['S001']);
  });

  it('语法错误时跳过语义分析', () => {
    const result = compile('var x: int = ;\ny = 2;');
    assert.equal(result.success, false);
    assert.deepEqual(result.stages, { parse: false, analyze: null, generate: null });
    assert.deepEqual(result.diagnostics.map(d => d.code), ['P001']);
  });

  it('未声明的循环变量只报告一次且不生成 IR', () => {
    const result = compile('while (i < 5) { i = i + 1; }');
    assert.equal(result.success, false);
    assert.equal(result.module, null);
    assert.deepEqual(result.stages, { parse: true, analyze: false, generate: null });
    assert.deepEqual(
      result.diagnostics.map(d => [d.code, d.message, d.span.start.line, d.span.start.column]),
      [['S001', 'Undefined variable: i', 1, 8]]
    );
  });

  it('未闭合字符串报告词法错误且不解析语句', () => {
    const result = compile('"unterminated');
    assert.equal(result.success, false);
    assert.equal(result.program.statements.length, 0);
    assert.deepEqual(
      result.diagnostics.map(d => [d.code, d.span.start.line, d.span.start.column]),
      [['L002', 1, 1]]
    );
  });

  it('模块名与顶层函数名可配置', () => {
    const result = compile('printInt(7);', { moduleName: 'demo', toplevelName: 'start' });
    assert.equal(result.success, true);
    assert.ok(result.module);
    assert.equal(result.module.name, 'demo');
    assert.equal(result.toplevel, 'start');
    const start = result.module.functions.find(fn => fn.name === 'start');
    assert.ok(start);
    assert.equal(
      formatFunction(start),
      ['define void @start() {', 'entry:', '  call void @printInt(i32 7)', '  ret void', '}'].join('\n')
    );
  });

  it('函数读写顶层变量，编译各阶段均成功', () => {
    const result = compile('var g: int = 1;\nfunction f(): int { return g; }');
    assert.deepEqual(result.stages, { parse: true, analyze: true, generate: true });
    assert.ok(result.module);
    assert.deepEqual(result.module.globals.map(g => g.name), ['g']);
  });

  it('分支中的函数声明在分析阶段被拒绝，不进入生成', () => {
    const result = compile('if (true) function h() { print("x"); }');
    assert.deepEqual(result.stages, { parse: true, analyze: false, generate: null });
    assert.deepEqual(result.diagnostics.map(d => d.code), ['S010']);
  });

  it('函数名作为值在分析阶段被拒绝', () => {
    const result = compile('function k(): int { return 1; }\nvar v = k;');
    assert.deepEqual(result.stages, { parse: true, analyze: false, generate: null });
    assert.deepEqual(result.diagnostics.map(d => d.code), ['S011']);
  });

  it('警告不影响编译成功', () => {
    const result = compile('function f(n: int): int { if (n > 0) { return 1; } }');
    assert.equal(result.success, true);
    assert.deepEqual(result.diagnostics.map(d => d.code), ['G004']);
  });
});
