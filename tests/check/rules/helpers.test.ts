/**
 * Shared Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatCounts,
  formatQuotedList,
  locationAt,
} from '../../../src/check/rules/helpers.js';

describe('locationAt', () => {
  it('maps offset 0 to line 1 column 1', () => {
    expect(locationAt('abc', 0)).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('counts lines and columns after newlines', () => {
    expect(locationAt('ab\ncd\nef', 7)).toEqual({
      line: 3,
      column: 2,
      offset: 7,
    });
  });

  it('clamps offsets past the end', () => {
    expect(locationAt('ab', 10)).toEqual({ line: 1, column: 3, offset: 2 });
  });
});

describe('formatQuotedList', () => {
  it('renders an empty list', () => {
    expect(formatQuotedList([])).toBe('[]');
  });

  it('quotes and separates items', () => {
    expect(formatQuotedList(['ab', 'T(1)'])).toBe("['ab', 'T(1)']");
  });

  it('escapes backslashes and tabs', () => {
    expect(formatQuotedList(['a\\b\tc'])).toBe("['a\\\\b\\tc']");
  });
});

describe('formatCounts', () => {
  it('renders an empty table', () => {
    expect(formatCounts([])).toBe('{}');
  });

  it('orders by frequency, ties by first appearance', () => {
    expect(formatCounts([2, 0, 0, 2, 1])).toBe('{2: 2, 0: 2, 1: 1}');
  });
});
