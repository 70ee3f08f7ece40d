import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { irCommand } from '../../../src/cli/commands/ir.js';
import { deserializeModule } from '../../../src/ir/ir_json.js';
import { captureConsole, createWorkspace, type CapturedOutput, type Workspace } from '../console-capture.js';

const TOPLEVEL = ['define void @__toplevel() {', 'entry:', '  call void @printInt(i32 7)', '  ret void', '}'].join('\n');

describe('irCommand', { concurrency: false }, () => {
  let workspace: Workspace;
  let output: CapturedOutput;
  let restore: () => void;

  beforeEach(() => {
    workspace = createWorkspace('cinder-ir-');
    ({ output, restore } = captureConsole());
  });

  afterEach(() => {
    restore();
    workspace.cleanup();
  });

  it('文本 IR 输出到控制台，模块名取自文件名', () => {
    const file = workspace.write('demo.cnd', 'printInt(7);');
    assert.equal(irCommand(file), 0);
    assert.equal(output.logs.length, 1);
    const text = output.logs[0] ?? '';
    assert.equal(text.split('\n')[0], "; ModuleID = 'demo'");
    assert.ok(text.endsWith(TOPLEVEL));
  });

  it('-o 将 IR 写入文件', () => {
    const file = workspace.write('demo.cnd', 'printInt(7);');
    const out = join(workspace.dir, 'demo.ll');
    assert.equal(irCommand(file, { output: out }), 0);
    assert.deepEqual(output.logs, []);
    assert.ok(readFileSync(out, 'utf8').endsWith(`${TOPLEVEL}\n`));
  });

  it('--json 输出可以反序列化的封装', () => {
    const file = workspace.write('demo.cnd', 'printInt(7);');
    const out = join(workspace.dir, 'demo.json');
    assert.equal(irCommand(file, { output: out, json: true }), 0);
    const json = readFileSync(out, 'utf8');
    const envelope: unknown = JSON.parse(json);
    assert.ok(typeof envelope === 'object' && envelope !== null && 'metadata' in envelope);
    assert.ok(typeof envelope.metadata === 'object' && envelope.metadata !== null);
    assert.deepEqual(Object.keys(envelope.metadata).sort(), ['generatedAt', 'source']);
    const module = deserializeModule(json);
    assert.equal(module.name, 'demo');
    assert.ok(module.functions.some(fn => fn.name === '__toplevel' && !fn.external));
  });

  it('编译失败时不写输出文件并返回 1', () => {
    const file = workspace.write('bad.cnd', 'printInt(x);');
    const out = join(workspace.dir, 'bad.ll');
    assert.equal(irCommand(file, { output: out }), 1);
    assert.equal(existsSync(out), false);
    assert.deepEqual(output.errors, ['✗ error S001: Undefined variable: x at 1:10']);
  });

  it('警告随 IR 一并输出，退出码为 0', () => {
    const file = workspace.write('warn.cnd', 'function f(b: bool): int { if (b) { return 1; } }');
    assert.equal(irCommand(file), 0);
    assert.deepEqual(output.warnings, ['⚠ warning G004: Function f may reach end without returning a value at 1:10']);
  });
});
