/**
 * @module cli/utils/logger
 *
 * 命令行输出。命令结果（token 列表、IR、程序输出、ℹ/✓ 行）写到 stdout，
 * 诊断的错误行走 console.error，警告行走 console.warn，源码摘录跟随所属诊断。
 */

import { DiagnosticSeverity, formatDiagnostic, type Diagnostic } from '../../diagnostics/diagnostics.js';

/** 输出行的种类；detail 是附属于上一行的暗色正文 */
export type Tone = 'info' | 'success' | 'warning' | 'error' | 'detail';

interface ToneStyle {
  readonly symbol: string;
  readonly color: string;
  readonly channel: 'log' | 'warn' | 'error';
}

const RESET = '\u001B[0m';

const TONES: Readonly<Record<Tone, ToneStyle>> = {
  info: { symbol: 'ℹ', color: '\u001B[36m', channel: 'log' },
  success: { symbol: '✓', color: '\u001B[32m', channel: 'log' },
  warning: { symbol: '⚠', color: '\u001B[33m', channel: 'warn' },
  error: { symbol: '✗', color: '\u001B[31m', channel: 'error' },
  detail: { symbol: '', color: '\u001B[2m', channel: 'error' },
};

export function emit(tone: Tone, message: string): void {
  const { symbol, color, channel } = TONES[tone];
  const line = symbol ? `${color}${symbol}${RESET} ${message}` : `${color}${message}${RESET}`;
  switch (channel) {
    case 'log':
      console.log(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'error':
      console.error(line);
      return;
  }
}

export function info(message: string): void {
  emit('info', message);
}

export function success(message: string): void {
  emit('success', message);
}

export function warn(message: string): void {
  emit('warning', message);
}

export function error(message: string): void {
  emit('error', message);
}

export function toneOf(severity: DiagnosticSeverity): Tone {
  switch (severity) {
    case DiagnosticSeverity.Error:
      return 'error';
    case DiagnosticSeverity.Warning:
      return 'warning';
    case DiagnosticSeverity.Info:
      return 'info';
  }
}

/**
 * 输出一条诊断。首行按严重级别着色；给出 `source` 时，
 * 源码摘录作为 detail 行紧随其后。
 */
export function diagnostic(diag: Diagnostic, source?: string): void {
  const [head = '', ...excerpt] = formatDiagnostic(diag, source).split('\n');
  emit(toneOf(diag.severity), head);
  if (excerpt.length > 0) emit('detail', excerpt.join('\n'));
}
