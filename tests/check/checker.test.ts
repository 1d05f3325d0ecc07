/**
 * Checker Tests
 * Report assembly, rule ordering, truncation and configuration effects.
 */

import { describe, it, expect } from 'vitest';
import { check, MAX_REPORTED } from '../../src/check/checker.js';
import { resolveConfig } from '../../src/check/config.js';
import type { Report } from '../../src/check/types.js';

const AUTO_FIX_MESSAGE =
  "Auto-fixed 'not in' to '!(... in ...)' – see fixed code below";

/** Narrow a report to the dirty variant or fail the test */
function expectDirty(report: Report) {
  if (report.status !== 'dirty') {
    throw new Error(`Expected dirty report, got ${report.status}`);
  }
  return report;
}

describe('check', () => {
  describe('clean reports', () => {
    it('echoes the source when nothing is found', () => {
      const source = 'function f(x)\n    return x + 1\nend\n';
      expect(check(source)).toEqual({ status: 'clean', code: source });
    });

    it('accepts functions named with non-ASCII letters', () => {
      const source = 'function σ(x)\n    x\nend\n';
      expect(check(source)).toEqual({ status: 'clean', code: source });
    });

    it('treats empty input as clean', () => {
      expect(check('')).toEqual({ status: 'clean', code: '' });
    });
  });

  describe('dirty reports', () => {
    it('reports a function without end', () => {
      const source = 'function f(x)\n    x\n';
      const report = expectDirty(check(source));

      expect(report.total).toBe(1);
      expect(report.diagnostics.map((d) => d.message)).toEqual([
        "Imbalance: 1 'function' vs 0 'end'",
      ]);
      expect(report.autoFixed).toBe(false);
      expect(report.code).toBe(source);
    });

    it('reports a two-character single-quoted literal', () => {
      const report = expectDirty(check("c = 'ab'"));
      expect(report.diagnostics.map((d) => d.message)).toEqual([
        "Multi-char literals: ['ab']... – use string",
      ]);
    });

    it('maps and/True to their Julia spellings', () => {
      const report = expectDirty(check('x = a and True'));
      expect(report.diagnostics.map((d) => d.message)).toEqual([
        "Non-Julia operators: 'True' (use 'true'), 'and' (use '&&')...",
      ]);
    });

    it('embeds the fixed code when the auto-fix fires', () => {
      const report = expectDirty(check('ok = "x" not in y;\n'));

      expect(report.diagnostics.map((d) => d.message)).toEqual([
        AUTO_FIX_MESSAGE,
      ]);
      expect(report.autoFixed).toBe(true);
      expect(report.code).toBe('ok = !x in y;\n');
    });

    it('keeps rule order regardless of position in the source', () => {
      const source = "function f()\n  x = T(1) and 'ab'\n";
      const report = expectDirty(check(source));

      expect(report.diagnostics.map((d) => d.code)).toEqual([
        'BLOCK_BALANCE',
        'MULTI_CHAR_LITERAL',
        'INDENT_CONSISTENCY',
        'REDUNDANT_CONVERSION',
        'FOREIGN_OPERATOR',
      ]);
    });
  });

  describe('truncation', () => {
    it('lists at most ten diagnostics but counts all', () => {
      const report = expectDirty(check('catch e\n'.repeat(12)));

      expect(MAX_REPORTED).toBe(10);
      expect(report.total).toBe(12);
      expect(report.diagnostics).toHaveLength(10);
    });

    it('embeds the original code when the auto-fix is truncated away', () => {
      const source = 'catch e\n'.repeat(12) + 'ok = "x" not in y;\n';
      const report = expectDirty(check(source));

      expect(report.total).toBe(13);
      expect(report.autoFixed).toBe(false);
      expect(report.code).toBe(source);
    });

    it('embeds the fixed code when the auto-fix is within the first ten', () => {
      const report = expectDirty(check('catch e\nok = "x" not in y;\n'));

      expect(report.total).toBe(2);
      expect(report.autoFixed).toBe(true);
      expect(report.code).toBe('catch e\nok = !x in y;\n');
    });
  });

  describe('purity', () => {
    it('returns equal reports for repeated calls', () => {
      const source = "function f()\n  x = 'ab' and True\n  ok = \"a\" not in y\n";
      expect(check(source)).toEqual(check(source));
    });
  });

  describe('configuration', () => {
    it('skips rules turned off', () => {
      const config = resolveConfig({ rules: { BLOCK_BALANCE: 'off' } });
      expect(check('function f(x)\n    x\n', config).status).toBe('clean');
    });

    it('downgrades rules set to warn', () => {
      const config = resolveConfig({ rules: { BLOCK_BALANCE: 'warn' } });
      const report = expectDirty(check('function f(x)\n    x\n', config));
      expect(report.diagnostics[0]?.severity).toBe('warning');
    });

    it('applies severity overrides', () => {
      const config = resolveConfig({ severity: { QUOTE_BALANCE: 'info' } });
      const report = expectDirty(check('x = "a', config));
      expect(report.diagnostics[0]?.code).toBe('QUOTE_BALANCE');
      expect(report.diagnostics[0]?.severity).toBe('info');
    });
  });
});
