import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { diagnostic, error, info, success, toneOf, warn } from '../../../src/cli/utils/logger.js';
import { DiagnosticCode, DiagnosticSeverity, type Diagnostic } from '../../../src/diagnostics/diagnostics.js';
import { captureConsole, type CapturedOutput } from '../console-capture.js';

function at(severity: DiagnosticSeverity, code: DiagnosticCode, message: string): Diagnostic {
  const loc = { line: 1, column: 1, offset: 0 };
  return { severity, code, message, span: { start: loc, end: loc } };
}

describe('cli logger', { concurrency: false }, () => {
  let output: CapturedOutput;
  let restore: () => void;

  beforeEach(() => {
    ({ output, restore } = captureConsole());
  });

  afterEach(() => {
    restore();
  });

  it('各种输出走各自的通道并带符号', () => {
    info('compiled');
    success('no problems');
    warn('careful');
    error('failed');
    assert.deepEqual(output.logs, ['ℹ compiled', '✓ no problems']);
    assert.deepEqual(output.warnings, ['⚠ careful']);
    assert.deepEqual(output.errors, ['✗ failed']);
  });

  it('严重级别映射到输出种类', () => {
    assert.deepEqual(
      [DiagnosticSeverity.Error, DiagnosticSeverity.Warning, DiagnosticSeverity.Info].map(toneOf),
      ['error', 'warning', 'info']
    );
  });

  it('错误诊断与源码摘录都写到 stderr', () => {
    diagnostic(at(DiagnosticSeverity.Error, DiagnosticCode.S001_UndefinedVariable, 'Undefined variable: x'), 'x;');
    assert.deepEqual(output.errors, [
      '✗ error S001: Undefined variable: x at 1:1',
      ['> 1| x;', '>' + ' '.repeat(4) + '^'].join('\n'),
    ]);
  });

  it('警告诊断走 warn 通道，没有源码时不输出摘录', () => {
    diagnostic(at(DiagnosticSeverity.Warning, DiagnosticCode.G004_MissingReturn, 'Function f may reach end without returning a value'));
    assert.deepEqual(output.warnings, ['⚠ warning G004: Function f may reach end without returning a value at 1:1']);
    assert.deepEqual(output.errors, []);
  });
});
