/**
 * Block Structure Rules
 * Coarse checks on function/end pairing and catch clauses.
 */

import type {
  ValidationRule,
  Diagnostic,
  ValidationContext,
} from '../types.js';
import { findAll, locationAt } from './helpers.js';

// ============================================================
// BLOCK_BALANCE RULE
// ============================================================

// Identifier characters include non-ASCII letters such as σ or ε
const FUNCTION_KEYWORD = /function\s+[\p{L}\p{N}\p{M}_]/gu;
const END_LINE = /^\s*end\s*$/gm;

/**
 * Compares `function` definitions against lines holding only `end`.
 *
 * Detection:
 * - Counts `function` followed by whitespace and an identifier character
 * - Counts lines consisting solely of `end`
 * - Reports both counts when they differ
 *
 * Conditionals, loops and other block openers are not counted, so
 * scripts using them will report an imbalance.
 */
export const BLOCK_BALANCE: ValidationRule = {
  code: 'BLOCK_BALANCE',
  category: 'blocks',
  severity: 'error',

  validate(context: ValidationContext): Diagnostic[] {
    const functions = findAll(FUNCTION_KEYWORD, context.source).length;
    const ends = findAll(END_LINE, context.source).length;

    if (functions === ends) {
      return [];
    }

    return [
      {
        code: 'BLOCK_BALANCE',
        category: 'blocks',
        severity: 'error',
        message: `Imbalance: ${functions} 'function' vs ${ends} 'end'`,
        location: null,
        fixes: [],
      },
    ];
  },
};

// ============================================================
// CATCH_SYNTAX RULE
// ============================================================

// Lazy body stops before the next newline or `end`, whichever comes first
const BAD_CATCH =
  /catch\s+(?!_|[\p{L}\p{N}\p{M}_]+\s*;)[\s\S]*?(?=\n|end)/gu;

/**
 * Flags catch clauses not written as `catch _;` or `catch err;`.
 *
 * Valid patterns:
 * - catch _; println("failed")
 * - catch err; rethrow(err)
 *
 * Flagged:
 * - catch e
 * - catch e println(e)
 *
 * One diagnostic per offending clause, quoting the clause text.
 */
export const CATCH_SYNTAX: ValidationRule = {
  code: 'CATCH_SYNTAX',
  category: 'blocks',
  severity: 'error',

  validate(context: ValidationContext): Diagnostic[] {
    return findAll(BAD_CATCH, context.source).map((match): Diagnostic => ({
      code: 'CATCH_SYNTAX',
      category: 'blocks',
      severity: 'error',
      message: `Invalid catch: '${match[0].trim()}' – use 'catch _;' or 'catch err;'`,
      location: locationAt(context.source, match.index ?? 0),
      fixes: [],
    }));
  },
};
