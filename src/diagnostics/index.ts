/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder)
 * - 诊断收集器 (DiagnosticSink)
 * - 诊断严重级别 (DiagnosticSeverity)
 * - 诊断代码 (DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticBuilder,
  DiagnosticSink,
  Diagnostics,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics.js';
