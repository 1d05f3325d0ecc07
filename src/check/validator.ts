/**
 * Script Validator
 * Runs every enabled rule over the source text in registry order.
 */

import type {
  CheckConfig,
  Diagnostic,
  Severity,
  ValidationContext,
} from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate source text against all enabled rules.
 * Diagnostics keep the order in which rules ran; they are not sorted by
 * location.
 *
 * @param source - Source text to validate
 * @param config - Configuration determining which rules are active
 * @returns Diagnostics in rule order, with configured severities
 */
export function validateScript(
  source: string,
  config: CheckConfig
): Diagnostic[] {
  const context: ValidationContext = { source, config };
  const diagnostics: Diagnostic[] = [];

  for (const rule of VALIDATION_RULES) {
    if (!isRuleEnabled(rule.code, config)) {
      continue;
    }

    const severity = resolveSeverity(rule.code, rule.severity, config);
    for (const diagnostic of rule.validate(context)) {
      diagnostics.push(
        diagnostic.severity === severity
          ? diagnostic
          : { ...diagnostic, severity }
      );
    }
  }

  return diagnostics;
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Check if a rule is enabled based on configuration.
 * Rules are enabled if state is 'on' or 'warn'; unlisted rules run.
 */
function isRuleEnabled(ruleCode: string, config: CheckConfig): boolean {
  const state = config.rules[ruleCode] ?? 'on';
  return state === 'on' || state === 'warn';
}

/**
 * 'warn' pins a rule to warning; otherwise an override beats the default.
 */
function resolveSeverity(
  ruleCode: string,
  fallback: Severity,
  config: CheckConfig
): Severity {
  if (config.rules[ruleCode] === 'warn') {
    return 'warning';
  }
  return config.severity[ruleCode] ?? fallback;
}
