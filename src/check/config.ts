/**
 * Configuration for jlcheck
 * Builds and validates in-process rule configuration.
 */

import type { CheckConfig, RuleState, Severity } from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled.
 * Returns configuration where all known rules are set to 'on'.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity };
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read an optional record field, checking every value with a guard.
 * Throws Error naming the field or the offending rule.
 */
function readField<T>(
  data: Record<string, unknown>,
  field: 'rules' | 'severity',
  guard: (value: unknown) => value is T,
  expected: string
): Record<string, T> {
  if (!(field in data)) {
    return {};
  }

  const raw = data[field];
  if (!isPlainObject(raw)) {
    throw new Error(`Invalid configuration: ${field} must be an object`);
  }

  const result: Record<string, T> = {};
  for (const [code, value] of Object.entries(raw)) {
    if (!guard(value)) {
      const kind = field === 'rules' ? 'state' : 'severity';
      throw new Error(
        `Invalid configuration: rule ${code} has invalid ${kind} "${String(value)}" (must be ${expected})`
      );
    }
    result[code] = value;
  }
  return result;
}

/**
 * Validate that all rule codes in config are known rules.
 * Throws Error if unknown rule code found.
 */
function validateRuleCodes(config: CheckConfig): void {
  const knownRules = new Set(VALIDATION_RULES.map((r) => r.code));

  for (const code of [
    ...Object.keys(config.rules),
    ...Object.keys(config.severity),
  ]) {
    if (!knownRules.has(code)) {
      throw new Error(`Invalid configuration: unknown rule ${code}`);
    }
  }
}

// ============================================================
// CONFIGURATION RESOLUTION
// ============================================================

/**
 * Merge configuration overrides over the defaults.
 *
 * @param data - Object with optional `rules` and `severity` records
 * @returns Complete CheckConfig
 * @throws Error with "Invalid configuration: {reason}" for malformed input
 * @throws Error with "Invalid configuration: unknown rule {code}" for unknown rules
 */
export function resolveConfig(data: unknown): CheckConfig {
  if (!isPlainObject(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  const rules = readField(data, 'rules', isRuleState, "'on', 'off', or 'warn'");
  const severity = readField(
    data,
    'severity',
    isSeverity,
    "'error', 'warning', or 'info'"
  );

  validateRuleCodes({ rules, severity });

  const defaults = createDefaultConfig();
  return {
    rules: { ...defaults.rules, ...rules },
    severity: { ...defaults.severity, ...severity },
  };
}
