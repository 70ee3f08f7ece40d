import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { tokensCommand } from '../../../src/cli/commands/tokens.js';
import { captureConsole, createWorkspace, type CapturedOutput, type Workspace } from '../console-capture.js';

describe('tokensCommand', { concurrency: false }, () => {
  let workspace: Workspace;
  let output: CapturedOutput;
  let restore: () => void;

  beforeEach(() => {
    workspace = createWorkspace('cinder-tokens-');
    ({ output, restore } = captureConsole());
  });

  afterEach(() => {
    restore();
    workspace.cleanup();
  });

  it('每行输出一个词法单元', () => {
    const file = workspace.write('ok.cnd', 'var x = 1;');
    assert.equal(tokensCommand(file), 0);
    assert.deepEqual(output.logs, [
      [
        "VAR('var', 1:1)",
        "IDENTIFIER('x', 1:5)",
        "ASSIGN('=', 1:7)",
        "INTEGER('1', 1:9)",
        "SEMICOLON(';', 1:10)",
      ].join('\n'),
    ]);
    assert.deepEqual(output.errors, []);
  });

  it('空文件不输出任何内容', () => {
    const file = workspace.write('empty.cnd', '');
    assert.equal(tokensCommand(file), 0);
    assert.deepEqual(output.logs, []);
  });

  it('词法错误时输出诊断并返回 1', () => {
    const file = workspace.write('bad.cnd', 'var s = "abc');
    assert.equal(tokensCommand(file), 1);
    assert.deepEqual(output.errors, ['✗ error L002: Lexical error: Unterminated string at 1:9']);
  });

  it('语法错误不影响词法输出的退出码', () => {
    const file = workspace.write('syntax.cnd', 'var = ;');
    assert.equal(tokensCommand(file), 0);
    assert.deepEqual(output.errors, []);
  });
});
