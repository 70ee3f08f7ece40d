import type { SourceLocation, Span } from '../types.js';

/** 源文件起始位置 */
export const START_LOCATION: SourceLocation = { line: 1, column: 1, offset: 0 };

/**
 * 越过一个字符后的新位置。换行符使行号加一并将列号重置为 1。
 */
export function advanceLocation(loc: SourceLocation, ch: string): SourceLocation {
  if (ch === '\n') {
    return { line: loc.line + 1, column: 1, offset: loc.offset + 1 };
  }
  return { line: loc.line, column: loc.column + 1, offset: loc.offset + 1 };
}

export function formatLocation(loc: SourceLocation): string {
  return `${loc.line}:${loc.column}`;
}

export function pointSpan(loc: SourceLocation): Span {
  return { start: loc, end: loc };
}
