/**
 * Validation Rules Registry
 * Barrel export for all validation rules.
 */

import type { ValidationRule } from '../types.js';
import { BLOCK_BALANCE, CATCH_SYNTAX } from './blocks.js';
import { QUOTE_BALANCE, MULTI_CHAR_LITERAL } from './strings.js';
import { INDENT_CONSISTENCY } from './formatting.js';
import {
  REDUNDANT_CONVERSION,
  VAGUE_FILTER,
  FOREIGN_OPERATOR,
  NEGATED_MEMBERSHIP,
} from './anti-patterns.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export { BLOCK_BALANCE, CATCH_SYNTAX } from './blocks.js';
export { QUOTE_BALANCE, MULTI_CHAR_LITERAL } from './strings.js';
export { INDENT_CONSISTENCY } from './formatting.js';
export {
  REDUNDANT_CONVERSION,
  VAGUE_FILTER,
  FOREIGN_OPERATOR,
  NEGATED_MEMBERSHIP,
} from './anti-patterns.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/**
 * All registered validation rules, in report order.
 * Report truncation keeps the first diagnostics, so this order decides
 * which findings survive; the auto-fix rule runs last.
 */
export const VALIDATION_RULES: readonly ValidationRule[] = [
  // Block structure
  BLOCK_BALANCE,
  CATCH_SYNTAX,

  // String handling
  QUOTE_BALANCE,
  MULTI_CHAR_LITERAL,

  // Formatting
  INDENT_CONSISTENCY,

  // Anti-patterns
  REDUNDANT_CONVERSION,
  VAGUE_FILTER,
  FOREIGN_OPERATOR,
  NEGATED_MEMBERSHIP,
];
