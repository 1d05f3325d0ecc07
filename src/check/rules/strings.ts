/**
 * String Handling Rules
 * Quote parity and character literal misuse.
 */

import type {
  ValidationRule,
  Diagnostic,
  ValidationContext,
} from '../types.js';
import { findAll, formatQuotedList, locationAt } from './helpers.js';

// ============================================================
// QUOTE_BALANCE RULE
// ============================================================

/**
 * Checks that the total number of quote marks is even.
 *
 * Detection:
 * - Counts every `"` and `'` in the whole text, comments included
 * - Reports once when the sum is odd
 *
 * A parity check only: an apostrophe in a comment or a transpose
 * operator (`A'`) can tip the count either way.
 */
export const QUOTE_BALANCE: ValidationRule = {
  code: 'QUOTE_BALANCE',
  category: 'strings',
  severity: 'error',

  validate(context: ValidationContext): Diagnostic[] {
    let quotes = 0;
    for (const ch of context.source) {
      if (ch === '"' || ch === "'") quotes++;
    }

    if (quotes % 2 === 0) {
      return [];
    }

    return [
      {
        code: 'QUOTE_BALANCE',
        category: 'strings',
        severity: 'error',
        message: 'Unbalanced quotes (odd count)',
        location: null,
        fixes: [],
      },
    ];
  },
};

// ============================================================
// MULTI_CHAR_LITERAL RULE
// ============================================================

const MULTI_CHAR = /'([^']{2,})'/g;

/** Number of literals quoted in the message */
const MAX_LISTED = 3;

/**
 * Flags single-quoted literals holding more than one character.
 * Single quotes delimit Char literals; text belongs in double quotes.
 *
 * Valid patterns:
 * - 'a'
 * - "abc"
 *
 * Flagged:
 * - 'abc'
 */
export const MULTI_CHAR_LITERAL: ValidationRule = {
  code: 'MULTI_CHAR_LITERAL',
  category: 'strings',
  severity: 'error',

  validate(context: ValidationContext): Diagnostic[] {
    const matches = findAll(MULTI_CHAR, context.source);
    const first = matches[0];
    if (!first) {
      return [];
    }

    const literals = matches
      .slice(0, MAX_LISTED)
      .map((match) => match[1] ?? '');

    return [
      {
        code: 'MULTI_CHAR_LITERAL',
        category: 'strings',
        severity: 'error',
        message: `Multi-char literals: ${formatQuotedList(literals)}... – use string`,
        location: locationAt(context.source, first.index ?? 0),
        fixes: [],
      },
    ];
  },
};
