/**
 * Check Types
 * Type definitions for the jlcheck static analysis tool.
 */

// ============================================================
// SOURCE POSITIONS
// ============================================================

/** Position in source text (1-based line/column, 0-based offset) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open range in source text */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * Fix suggestion for a diagnostic.
 * Provides automated fix information that can be applied to source code.
 */
export interface Fix {
  /** Human-readable description of what the fix does */
  readonly description: string;
  /** Whether the fix can be safely applied automatically */
  readonly applicable: boolean;
  /** Source range to replace */
  readonly range: SourceSpan;
  /** Replacement text */
  readonly replacement: string;
}

/**
 * A single issue found during validation.
 * The message is the complete human-readable text shown in reports.
 */
export interface Diagnostic {
  /** Rule code (e.g., BLOCK_BALANCE) */
  readonly code: string;
  /** Rule category */
  readonly category: RuleCategory;
  /** Severity level */
  readonly severity: Severity;
  /** Human-readable description */
  readonly message: string;
  /** First offending match, null for whole-text findings */
  readonly location: SourceLocation | null;
  /** Text edits; empty unless the rule rewrites source */
  readonly fixes: readonly Fix[];
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Configuration for check rules and severity overrides.
 * Controls which rules are active and at what severity level.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by rule code */
  readonly severity: Record<string, Severity>;
}

// ============================================================
// VALIDATION CONTEXT
// ============================================================

/**
 * Context for one validation pass.
 * Rules read the source and never mutate it.
 */
export interface ValidationContext {
  /** Original source text */
  readonly source: string;
  /** Active configuration */
  readonly config: CheckConfig;
}

// ============================================================
// VALIDATION RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory =
  | 'blocks'
  | 'strings'
  | 'formatting'
  | 'anti-patterns';

/**
 * Validation rule interface.
 * Rules are stateless - all context passed via ValidationContext.
 * Rules return diagnostics, never throw.
 */
export interface ValidationRule {
  /** Unique rule code (e.g., BLOCK_BALANCE) */
  readonly code: string;

  /** Rule category for grouping */
  readonly category: RuleCategory;

  /** Default severity level */
  readonly severity: Severity;

  /**
   * Validate the whole source text, returning diagnostics for violations.
   * Returned diagnostics carry the rule's default severity; the validator
   * applies configured overrides.
   */
  validate(context: ValidationContext): Diagnostic[];
}

// ============================================================
// REPORT
// ============================================================

/** Result of a check with no findings */
export interface CleanReport {
  readonly status: 'clean';
  /** Original source, unchanged */
  readonly code: string;
}

/** Result of a check with at least one finding */
export interface DirtyReport {
  readonly status: 'dirty';
  /** Number of diagnostics collected before truncation */
  readonly total: number;
  /** Diagnostics shown in the report, in rule order */
  readonly diagnostics: readonly Diagnostic[];
  /** Whether the auto-fix diagnostic is among the shown diagnostics */
  readonly autoFixed: boolean;
  /** Fixed source when autoFixed, else the original source */
  readonly code: string;
}

export type Report = CleanReport | DirtyReport;
