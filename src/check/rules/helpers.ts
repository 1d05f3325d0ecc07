/**
 * Shared Helper Functions
 * Common utilities used across validation rules.
 */

import type { SourceLocation } from '../types.js';

/**
 * Convert a character offset into a line/column location.
 * Lines and columns are 1-based; offsets past the end clamp to the end.
 */
export function locationAt(source: string, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, source.length));
  const before = source.slice(0, clamped);
  const lastNewline = before.lastIndexOf('\n');
  let line = 1;
  for (const ch of before) {
    if (ch === '\n') line++;
  }
  return { line, column: clamped - lastNewline, offset: clamped };
}

/**
 * Collect every match of a global pattern.
 */
export function findAll(pattern: RegExp, source: string): RegExpMatchArray[] {
  return [...source.matchAll(pattern)];
}

/**
 * Render strings as a bracketed list of single-quoted items.
 * Backslashes and control whitespace are escaped: ['ab', 'c\nd']
 */
export function formatQuotedList(items: readonly string[]): string {
  const quoted = items.map((item) => {
    const escaped = item
      .replace(/\\/g, '\\\\')
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r')
      .replace(/\t/g, '\\t');
    return `'${escaped}'`;
  });
  return `[${quoted.join(', ')}]`;
}

/**
 * Render a frequency table of values, most frequent first.
 * Ties keep the order in which values first appeared: {0: 3, 2: 1}
 */
export function formatCounts(values: readonly number[]): string {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const entries = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return `{${entries.map(([value, count]) => `${value}: ${count}`).join(', ')}}`;
}
