/**
 * Check Module - Static Analysis for Julia sources
 * Public API for the jlcheck tool.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  ValidationRule,
  RuleCategory,
  Severity,
  RuleState,
  Diagnostic,
  Fix,
  CheckConfig,
  ValidationContext,
  SourceLocation,
  SourceSpan,
  Report,
  CleanReport,
  DirtyReport,
} from './types.js';

// ============================================================
// RULE REGISTRY
// ============================================================
export { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export { createDefaultConfig, resolveConfig } from './config.js';

// ============================================================
// VALIDATION
// ============================================================
export { validateScript } from './validator.js';
export { check, MAX_REPORTED } from './checker.js';
export { formatReport } from './report.js';

// ============================================================
// FIX APPLICATION
// ============================================================
export { applyFixes, type ApplyResult } from './fixer.js';
