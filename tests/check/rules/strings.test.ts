/**
 * String Handling Rules Tests
 * Verify quote parity and character literal checks.
 */

import { describe, it, expect } from 'vitest';
import { diagnosticsFor, messagesFor } from '../../helpers/check.js';

// ============================================================
// QUOTE_BALANCE TESTS
// ============================================================

describe('QUOTE_BALANCE', () => {
  const messages = (source: string) => messagesFor(source, 'QUOTE_BALANCE');

  it('accepts closed string literals', () => {
    expect(messages('x = "a"')).toEqual([]);
  });

  it('accepts char literals', () => {
    expect(messages("c = 'a'")).toEqual([]);
  });

  it('reports an unterminated string', () => {
    expect(messages('x = "a')).toEqual(['Unbalanced quotes (odd count)']);
  });

  it('counts apostrophes inside strings', () => {
    expect(messages('s = "it\'s"')).toEqual(['Unbalanced quotes (odd count)']);
  });
});

// ============================================================
// MULTI_CHAR_LITERAL TESTS
// ============================================================

describe('MULTI_CHAR_LITERAL', () => {
  const messages = (source: string) =>
    messagesFor(source, 'MULTI_CHAR_LITERAL');

  it('accepts single-character literals', () => {
    expect(messages("c = 'a'")).toEqual([]);
  });

  it('reports a two-character literal', () => {
    expect(messages("c = 'ab'")).toEqual([
      "Multi-char literals: ['ab']... – use string",
    ]);
  });

  it('lists at most three literals', () => {
    expect(messages("'ab' 'cd' 'ef' 'gh'")).toEqual([
      "Multi-char literals: ['ab', 'cd', 'ef']... – use string",
    ]);
  });

  it('reads the gap between adjacent char literals as a literal', () => {
    expect(messages("x = 'a' + 'b'")).toEqual([
      "Multi-char literals: [' + ']... – use string",
    ]);
  });

  it('escapes newlines in listed literals', () => {
    expect(messages("'a\nb'")).toEqual([
      "Multi-char literals: ['a\\nb']... – use string",
    ]);
  });

  it('points at the first literal', () => {
    const [diagnostic] = diagnosticsFor("c = 'ab'", 'MULTI_CHAR_LITERAL');
    expect(diagnostic?.location).toEqual({ line: 1, column: 5, offset: 4 });
  });
});
