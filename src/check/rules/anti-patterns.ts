/**
 * Anti-Pattern Rules
 * Detects constructs carried over from other languages and redundant code.
 */

import type {
  ValidationRule,
  Diagnostic,
  ValidationContext,
  Fix,
} from '../types.js';
import { findAll, formatQuotedList, locationAt } from './helpers.js';

/** Number of offending snippets quoted in a message */
const MAX_LISTED = 3;

// ============================================================
// REDUNDANT_CONVERSION RULE
// ============================================================

const TYPE_WRAPPED_LITERAL = /T\([0-9.]+\)/g;

/**
 * Flags numeric literals wrapped in a type-parameter conversion.
 *
 * Discouraged:
 * - x * T(0.5)
 *
 * Preferred:
 * - x * 0.5 (promotion handles the conversion)
 */
export const REDUNDANT_CONVERSION: ValidationRule = {
  code: 'REDUNDANT_CONVERSION',
  category: 'anti-patterns',
  severity: 'info',

  validate(context: ValidationContext): Diagnostic[] {
    const matches = findAll(TYPE_WRAPPED_LITERAL, context.source);
    const first = matches[0];
    if (!first) {
      return [];
    }

    const calls = matches.slice(0, MAX_LISTED).map((match) => match[0]);

    return [
      {
        code: 'REDUNDANT_CONVERSION',
        category: 'anti-patterns',
        severity: 'info',
        message: `Redundant T(0.5): ${formatQuotedList(calls)}... – remove T()`,
        location: locationAt(context.source, first.index ?? 0),
        fixes: [],
      },
    ];
  },
};

// ============================================================
// VAGUE_FILTER RULE
// ============================================================

const FILTER_NOT_IN = /filter\(tf -> "([^"]*)" not in .*?\)/g;
const QUOTED = /"[^"]*"/;

/**
 * Flags `filter(tf -> "..." not in ...)` lambdas for a quoting review.
 * Reports each lambda whose captured text holds no quoted substring.
 * The capture stops at the first `"`, so every match qualifies.
 */
export const VAGUE_FILTER: ValidationRule = {
  code: 'VAGUE_FILTER',
  category: 'anti-patterns',
  severity: 'warning',

  validate(context: ValidationContext): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const match of findAll(FILTER_NOT_IN, context.source)) {
      const text = match[1] ?? '';
      if (QUOTED.test(text)) {
        continue;
      }
      diagnostics.push({
        code: 'VAGUE_FILTER',
        category: 'anti-patterns',
        severity: 'warning',
        message: `Vague filter 'not in' for '${text}' – check quotes`,
        location: locationAt(context.source, match.index ?? 0),
        fixes: [],
      });
    }

    return diagnostics;
  },
};

// ============================================================
// FOREIGN_OPERATOR RULE
// ============================================================

// Word boundaries on Unicode identifier characters, so `Trueα` is one name
const FOREIGN_TOKEN =
  /(?<![\p{L}\p{N}\p{M}_])(and|or|elif|True|False|is not)(?![\p{L}\p{N}\p{M}_])/gu;

/** Julia spelling for each foreign token */
const REPLACEMENTS: Readonly<Record<string, string>> = {
  and: '&&',
  or: '||',
  elif: 'elseif',
  True: 'true',
  False: 'false',
  'is not': '!==',
};

/**
 * Flags keywords and operators spelled the way other languages spell them.
 *
 * Detection:
 * - Whole-word and, or, elif, True, False, is not (any Unicode letter,
 *   digit or underscore extends a word)
 * - Distinct tokens in code-point order, first three listed
 *
 * `not in` is valid Julia and is not reported here.
 */
export const FOREIGN_OPERATOR: ValidationRule = {
  code: 'FOREIGN_OPERATOR',
  category: 'anti-patterns',
  severity: 'error',

  validate(context: ValidationContext): Diagnostic[] {
    const matches = findAll(FOREIGN_TOKEN, context.source);
    const first = matches[0];
    if (!first) {
      return [];
    }

    const tokens = [...new Set(matches.map((match) => match[0]))].sort();
    const listed = tokens
      .slice(0, MAX_LISTED)
      .map((token) => `'${token}' (use '${REPLACEMENTS[token] ?? 'Unknown'}')`);

    return [
      {
        code: 'FOREIGN_OPERATOR',
        category: 'anti-patterns',
        severity: 'error',
        message: `Non-Julia operators: ${listed.join(', ')}...`,
        location: locationAt(context.source, first.index ?? 0),
        fixes: [],
      },
    ];
  },
};

// ============================================================
// NEGATED_MEMBERSHIP RULE
// ============================================================

const QUOTED_NOT_IN =
  /("([^"]*)"|'([^']*)')\s*not\s+in\s*([^;,)\n]+)/g;

/**
 * Rewrites `"s" not in xs` as `!s in xs`.
 *
 * Each match becomes `!` + double-quoted content + ` in ` + the operand
 * running to the next `;`, `,`, `)` or newline. The quotes are dropped,
 * and a single-quoted operand rewrites to an empty name (`'a' not in xs`
 * becomes `! in xs`).
 *
 * Runs only when the text contains `not in`. One diagnostic, carrying a
 * fix per rewritten occurrence.
 */
export const NEGATED_MEMBERSHIP: ValidationRule = {
  code: 'NEGATED_MEMBERSHIP',
  category: 'anti-patterns',
  severity: 'info',

  validate(context: ValidationContext): Diagnostic[] {
    const { source } = context;
    if (!source.includes('not in')) {
      return [];
    }

    const fixes: Fix[] = [];
    let changed = false;

    for (const match of findAll(QUOTED_NOT_IN, source)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const replacement = `!${match[2] ?? ''} in ${match[4] ?? ''}`;
      if (replacement !== match[0]) {
        changed = true;
      }
      fixes.push({
        description: "Replace 'not in' with a negated membership test",
        applicable: true,
        range: {
          start: locationAt(source, start),
          end: locationAt(source, end),
        },
        replacement,
      });
    }

    const first = fixes[0];
    if (!changed || !first) {
      return [];
    }

    return [
      {
        code: 'NEGATED_MEMBERSHIP',
        category: 'anti-patterns',
        severity: 'info',
        message: "Auto-fixed 'not in' to '!(... in ...)' – see fixed code below",
        location: first.range.start,
        fixes,
      },
    ];
  },
};
