/**
 * Report Formatting
 * Text rendering of checker reports for the CLI.
 */

import type { Report } from './types.js';

/**
 * Format a report as text.
 *
 * Clean: success line, blank line, `Code:` and the source.
 * Dirty: issue count, one `- message` line per listed diagnostic, blank
 * line, `Fixed code:` and the embedded code.
 */
export function formatReport(report: Report): string {
  if (report.status === 'clean') {
    return `✅ Clean! Ready for Julia.\n\nCode:\n${report.code}`;
  }

  const lines = report.diagnostics.map((d) => `- ${d.message}`).join('\n');
  return `❌ Fixes (${report.total}):\n${lines}\n\nFixed code:\n${report.code}`;
}
