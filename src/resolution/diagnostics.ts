/**
 * Append-only diagnostic log produced by resolution.
 *
 * @packageDocumentation
 */

/**
 * Severity of a diagnostic record, in increasing order.
 */
export type Severity = 'info' | 'warning' | 'error';

/**
 * Minimum severity admitted into the log.
 *
 * `none` records nothing and also disables failing on errors, for lenient embedding.
 */
export type LogThreshold = Severity | 'none';

/**
 * One diagnostic record.
 */
export interface Diagnostic {
  readonly severity: Severity;
  /** The token, key or path the record is about. */
  readonly subject: string;
  readonly message: string;
}

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  info: 0,
  warning: 1,
  error: 2,
};

const THRESHOLD_RANK: Readonly<Record<LogThreshold, number>> = {
  ...SEVERITY_RANK,
  none: 3,
};

/**
 * Whether `severity` is at least as severe as `floor`.
 */
export function isAtLeast(severity: Severity, floor: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[floor];
}

/**
 * Returns the more severe of two severities; `undefined` means none seen.
 */
export function worstOf(a: Severity | undefined, b: Severity): Severity {
  return a === undefined || SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

/**
 * Ordered, append-only record of diagnostics filtered by a threshold.
 *
 * The worst severity is tracked for every appended record, including the
 * ones the threshold keeps out of the log.
 */
export class DiagnosticLog {
  private readonly threshold: LogThreshold;
  private readonly records: Diagnostic[] = [];
  private worst: Severity | undefined;

  /**
   * Creates an empty log.
   *
   * @param threshold - Minimum severity to record.
   */
  constructor(threshold: LogThreshold = 'warning') {
    this.threshold = threshold;
  }

  append(severity: Severity, subject: string, message: string): void {
    this.worst = worstOf(this.worst, severity);
    if (SEVERITY_RANK[severity] >= THRESHOLD_RANK[this.threshold]) {
      this.records.push(Object.freeze({ severity, subject, message }));
    }
  }

  info(subject: string, message: string): void {
    this.append('info', subject, message);
  }

  warning(subject: string, message: string): void {
    this.append('warning', subject, message);
  }

  error(subject: string, message: string): void {
    this.append('error', subject, message);
  }

  /**
   * Appends records produced elsewhere, such as by the validator.
   */
  appendAll(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) {
      this.append(diagnostic.severity, diagnostic.subject, diagnostic.message);
    }
  }

  /**
   * The worst severity appended so far, or undefined if nothing was appended.
   */
  worstSeverity(): Severity | undefined {
    return this.worst;
  }

  /**
   * Whether an error should fail the operation under this log's threshold.
   */
  hasFailure(): boolean {
    return this.threshold !== 'none' && this.worst === 'error';
  }

  entries(): readonly Diagnostic[] {
    return [...this.records];
  }
}
