/**
 * Fix Applier
 * Apply automatic fixes to source code with collision detection.
 */

import type { Diagnostic } from './types.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Result of applying fixes to source code.
 */
export interface ApplyResult {
  /** Modified source code with fixes applied */
  readonly modified: string;
  /** Number of fixes successfully applied */
  readonly applied: number;
  /** Number of fixes skipped */
  readonly skipped: number;
  /** Reasons for skipped fixes */
  readonly skippedReasons: Array<{ code: string; reason: string }>;
}

/**
 * Internal representation of a fix to apply.
 */
interface ApplicableFix {
  readonly code: string;
  readonly start: number;
  readonly end: number;
  readonly replacement: string;
}

// ============================================================
// FIX APPLICATION
// ============================================================

/**
 * Apply automatic fixes to source code.
 *
 * Constraints:
 * - Applies fixes in reverse position order (end to start) to avoid offset shifts
 * - Skips fixes where applicable === false
 * - Detects collisions (overlapping ranges) and skips with reason
 *
 * @param source - Original source code
 * @param diagnostics - Diagnostics with potential fixes
 * @returns ApplyResult with modified source and counts
 */
export function applyFixes(
  source: string,
  diagnostics: readonly Diagnostic[]
): ApplyResult {
  const fixes: ApplicableFix[] = diagnostics.flatMap((d) =>
    d.fixes
      .filter((fix) => fix.applicable)
      .map((fix) => ({
        code: d.code,
        start: fix.range.start.offset,
        end: fix.range.end.offset,
        replacement: fix.replacement,
      }))
  );

  if (fixes.length === 0) {
    return {
      modified: source,
      applied: 0,
      skipped: 0,
      skippedReasons: [],
    };
  }

  // Sort fixes by end position (descending) to apply from end to start
  const sortedFixes = fixes.slice().sort((a, b) => b.end - a.end);

  const { validFixes, skippedReasons } = filterCollisions(sortedFixes);

  let modified = source;
  for (const fix of validFixes) {
    const before = modified.slice(0, fix.start);
    const after = modified.slice(fix.end);
    modified = before + fix.replacement + after;
  }

  const applied = validFixes.length;
  const skipped = sortedFixes.length - applied;

  return {
    modified,
    applied,
    skipped,
    skippedReasons,
  };
}

// ============================================================
// COLLISION DETECTION
// ============================================================

/**
 * Filter fixes to remove overlapping ranges.
 *
 * Strategy: Keep first fix in sorted order (end to start),
 * skip subsequent fixes that overlap with any kept fix.
 *
 * @param sortedFixes - Fixes sorted by end position (descending)
 * @returns Valid fixes and reasons for skipped fixes
 */
function filterCollisions(sortedFixes: ApplicableFix[]): {
  validFixes: ApplicableFix[];
  skippedReasons: Array<{ code: string; reason: string }>;
} {
  const validFixes: ApplicableFix[] = [];
  const skippedReasons: Array<{ code: string; reason: string }> = [];

  for (const fix of sortedFixes) {
    const hasCollision = validFixes.some((kept) => rangesOverlap(fix, kept));

    if (hasCollision) {
      skippedReasons.push({
        code: fix.code,
        reason: 'Fix range overlaps with another fix',
      });
    } else {
      validFixes.push(fix);
    }
  }

  return { validFixes, skippedReasons };
}

/**
 * Ranges overlap if one starts before the other ends and ends after the
 * other starts.
 */
function rangesOverlap(
  a: { start: number; end: number },
  b: { start: number; end: number }
): boolean {
  return a.start < b.end && a.end > b.start;
}
