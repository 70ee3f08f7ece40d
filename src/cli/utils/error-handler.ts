import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { diagnostic, error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'lexical' | 'syntax' | 'semantic' | 'lowering';

export interface PrintDiagnosticsOptions {
  /** 诊断对应的源码；verbose 时用于打印摘录 */
  source?: string;
  /** 打印源码摘录与修复提示 */
  verbose?: boolean;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: string): CliErrorCategory {
  if (code.startsWith('L')) return 'lexical';
  if (code.startsWith('P')) return 'syntax';
  if (code.startsWith('S')) return 'semantic';
  return 'lowering';
}

function hintFor(code: string): string | null {
  switch (classify(code)) {
    case 'lexical':
      return '请检查非法字符或未闭合的字符串';
    case 'syntax':
      return '请检查括号、分号与语句结构';
    default:
      return null;
  }
}

/**
 * 依次输出诊断；verbose 时附带源码摘录与按类别的修复提示。
 */
export function printDiagnostics(diags: readonly Diagnostic[], options: PrintDiagnosticsOptions = {}): void {
  for (const diag of diags) {
    diagnostic(diag, options.verbose ? options.source : undefined);
    const hint = options.verbose ? hintFor(diag.code) : null;
    if (hint) {
      logWarn(hint);
    }
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    case 'EISDIR':
      logError(`目标是目录而不是文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

/**
 * 输出命令执行中抛出的异常，返回进程退出码。
 */
export function reportError(error: unknown): number {
  if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }
  return 1;
}

export function handleError(error: unknown): never {
  process.exit(reportError(error));
}
