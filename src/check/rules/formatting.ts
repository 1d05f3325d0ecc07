/**
 * Formatting Rules
 * Indentation width conventions.
 */

import type {
  ValidationRule,
  Diagnostic,
  ValidationContext,
} from '../types.js';
import { formatCounts } from './helpers.js';

// ============================================================
// INDENT_CONSISTENCY RULE
// ============================================================

/** Expected indentation step */
const INDENT_WIDTH = 4;

const LEADING_WHITESPACE = /^\s*/;

/**
 * Enforces indentation in multiples of four.
 *
 * Detection:
 * - Leading whitespace length of every non-blank line, modulo 4
 * - Tabs count as one character
 * - Reports once, with the count of every remainder seen (zeros included)
 */
export const INDENT_CONSISTENCY: ValidationRule = {
  code: 'INDENT_CONSISTENCY',
  category: 'formatting',
  severity: 'warning',

  validate(context: ValidationContext): Diagnostic[] {
    const remainders = context.source
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line) => {
        const indent = LEADING_WHITESPACE.exec(line)?.[0] ?? '';
        return indent.length % INDENT_WIDTH;
      });

    if (remainders.every((r) => r === 0)) {
      return [];
    }

    return [
      {
        code: 'INDENT_CONSISTENCY',
        category: 'formatting',
        severity: 'warning',
        message: `Inconsistent indentation: ${formatCounts(remainders)} – use 4 spaces`,
        location: null,
        fixes: [],
      },
    ];
  },
};
