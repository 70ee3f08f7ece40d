import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { handleError, printDiagnostics, reportError } from '../../../src/cli/utils/error-handler.js';
import { DiagnosticCode, DiagnosticSeverity, type Diagnostic } from '../../../src/diagnostics/diagnostics.js';
import { captureConsole, type CapturedOutput } from '../console-capture.js';

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super('exit');
  }
}

function makeDiagnostic(severity: DiagnosticSeverity, code: DiagnosticCode, message: string): Diagnostic {
  const loc = { line: 2, column: 3, offset: 0 };
  return { severity, code, message, span: { start: loc, end: loc } };
}

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('error-handler', { concurrency: false }, () => {
  let originalExit: typeof process.exit;
  let output: CapturedOutput;
  let restore: () => void;

  beforeEach(() => {
    originalExit = process.exit;
    process.exit = ((code?: number) => {
      throw new ExitSignal(code ?? 0);
    }) as never;
    ({ output, restore } = captureConsole());
  });

  afterEach(() => {
    process.exit = originalExit;
    restore();
  });

  it('错误与警告分别输出到 error/warn', () => {
    printDiagnostics([
      makeDiagnostic(DiagnosticSeverity.Error, DiagnosticCode.S001_UndefinedVariable, 'Undefined variable: a'),
      makeDiagnostic(DiagnosticSeverity.Warning, DiagnosticCode.G004_MissingReturn, 'Function f may reach end without returning a value'),
    ]);
    assert.deepEqual(output.errors, ['✗ error S001: Undefined variable: a at 2:3']);
    assert.deepEqual(output.warnings, ['⚠ warning G004: Function f may reach end without returning a value at 2:3']);
  });

  it('非 verbose 模式忽略源码', () => {
    printDiagnostics(
      [makeDiagnostic(DiagnosticSeverity.Error, DiagnosticCode.S001_UndefinedVariable, 'Undefined variable: a')],
      { source: 'x;\n  a;' }
    );
    assert.deepEqual(output.errors, ['✗ error S001: Undefined variable: a at 2:3']);
  });

  it('verbose 模式输出摘录与词法提示', () => {
    printDiagnostics(
      [makeDiagnostic(DiagnosticSeverity.Error, DiagnosticCode.L001_UnexpectedCharacter, 'Lexical error: Unexpected character: @')],
      { source: 'x;\n  @;', verbose: true }
    );
    assert.deepEqual(output.errors, [
      '✗ error L001: Lexical error: Unexpected character: @ at 2:3',
      '> 2|   @;\n>      ^',
    ]);
    assert.deepEqual(output.warnings, ['⚠ 请检查非法字符或未闭合的字符串']);
  });

  it('文件系统错误映射为中文说明', () => {
    assert.equal(reportError(errnoError('ENOENT', "ENOENT: no such file or directory, open 'a.cnd'")), 1);
    assert.equal(reportError(errnoError('EISDIR', 'EISDIR: illegal operation on a directory')), 1);
    assert.equal(reportError(errnoError('EACCES', 'EACCES: permission denied')), 1);
    assert.deepEqual(output.errors, [
      "✗ 未找到目标文件：ENOENT: no such file or directory, open 'a.cnd'",
      '✗ 目标是目录而不是文件：EISDIR: illegal operation on a directory',
      '✗ 文件权限不足：EACCES: permission denied',
    ]);
  });

  it('普通异常输出消息，未知值输出通用提示', () => {
    reportError(new Error('boom'));
    reportError('not an error');
    assert.deepEqual(output.errors, ['✗ boom', '✗ 发生未知错误，请重试']);
  });

  it('handleError 以退出码 1 结束进程', () => {
    assert.throws(
      () => handleError(new Error('fatal')),
      (error: unknown) => error instanceof ExitSignal && error.code === 1
    );
    assert.deepEqual(output.errors, ['✗ fatal']);
  });
});
