/**
 * Checker
 * Runs the rule battery and assembles a clean or dirty report.
 */

import type { CheckConfig, Report } from './types.js';
import { createDefaultConfig } from './config.js';
import { validateScript } from './validator.js';
import { applyFixes } from './fixer.js';
import { NEGATED_MEMBERSHIP } from './rules/index.js';

/** Diagnostics listed in a report; the total still counts all of them */
export const MAX_REPORTED = 10;

/**
 * Check source text and build a report.
 *
 * The embedded code is the auto-fixed text only when the auto-fix
 * diagnostic survives truncation to the first MAX_REPORTED diagnostics.
 *
 * @param source - Source text to check
 * @param config - Rule configuration (defaults to all rules on)
 */
export function check(
  source: string,
  config: CheckConfig = createDefaultConfig()
): Report {
  const diagnostics = validateScript(source, config);

  if (diagnostics.length === 0) {
    return { status: 'clean', code: source };
  }

  const reported = diagnostics.slice(0, MAX_REPORTED);
  const autoFix = reported.filter((d) => d.code === NEGATED_MEMBERSHIP.code);
  const autoFixed = autoFix.length > 0;

  return {
    status: 'dirty',
    total: diagnostics.length,
    diagnostics: reported,
    autoFixed,
    code: autoFixed ? applyFixes(source, autoFix).modified : source,
  };
}
