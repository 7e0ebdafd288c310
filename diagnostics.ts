import type { Result } from './result';
import { Err, OK_VOID } from './result';

export type Severity = 'error' | 'warning';

export type ViolationKind =
  | 'grammar'
  | 'unexpected-end-of-input'
  | 'nan-value'
  | 'attribute-byte-count'
  | 'negative-vertex'
  | 'winding-order'
  | 'solid-name-mismatch'
  | 'empty-line'
  | 'unnamed-solid';

/** Line numbers are 1-based; offsets are byte positions from the start of the file. */
export type Location =
  | { readonly kind: 'line'; readonly line: number }
  | { readonly kind: 'offset'; readonly offset: number };

export type Diagnostic = {
  readonly severity: Severity;
  readonly kind: ViolationKind;
  readonly location: Location;
  readonly expected: string;
  readonly actual?: string;
};

type Policy = 'always-error' | 'soft' | 'always-warning';

const POLICIES: Record<ViolationKind, Policy> = {
  'grammar': 'always-error',
  'unexpected-end-of-input': 'always-error',
  'nan-value': 'always-error',
  'attribute-byte-count': 'always-error',
  'negative-vertex': 'soft',
  'winding-order': 'soft',
  'solid-name-mismatch': 'soft',
  'empty-line': 'always-warning',
  'unnamed-solid': 'always-warning',
};

export const classify = (kind: ViolationKind, strict: boolean): Severity => {
  switch (POLICIES[kind]) {
    case 'always-error':
      return 'error';
    case 'always-warning':
      return 'warning';
    case 'soft':
      return strict ? 'error' : 'warning';
  }
};

export const lineAt = (line: number): Location => ({ kind: 'line', line });
export const offsetAt = (offset: number): Location => ({ kind: 'offset', offset });

export function renderMessage(diagnostic: Diagnostic): string {
  const { location, expected, actual } = diagnostic;
  if (location.kind === 'line') {
    const got = actual === undefined ? '' : ` but got '${actual.trim()}'`;
    return `line ${location.line}: Expected '${expected}'${got}.`;
  }
  const got = actual === undefined ? '' : `, but got '${actual}'`;
  return `byte offset ${location.offset}: ${expected}${got}.`;
}

export type AccumulatorOptions = {
  strict?: boolean;
  verbose?: boolean;
  log?: (line: string) => void;
};

/**
 * Counts and records the diagnostics of one validation run. Errors come back
 * as Err so the caller can stop walking the file; only the first is kept.
 */
export class DiagnosticAccumulator {
  readonly strict: boolean;
  private readonly verbose: boolean;
  private readonly log: (line: string) => void;
  private readonly recorded: Diagnostic[] = [];

  errorCount = 0;
  warningCount = 0;
  firstErrorMessage = '';
  firstError: Diagnostic | undefined;

  constructor(options: AccumulatorOptions = {}) {
    this.strict = options.strict ?? true;
    this.verbose = options.verbose ?? false;
    this.log = options.log ?? console.log;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.recorded;
  }

  warn(kind: ViolationKind, location: Location, expected: string, actual?: string): Result<void, Diagnostic> {
    const diagnostic: Diagnostic = { severity: 'warning', kind, location, expected, actual };
    this.warningCount++;
    this.recorded.push(diagnostic);
    if (this.verbose) this.log(`Warning on ${renderMessage(diagnostic)}`);
    return OK_VOID;
  }

  error(kind: ViolationKind, location: Location, expected: string, actual?: string): Result<never, Diagnostic> {
    const diagnostic: Diagnostic = { severity: 'error', kind, location, expected, actual };
    this.errorCount++;
    this.recorded.push(diagnostic);
    if (this.firstErrorMessage === '') {
      this.firstErrorMessage = renderMessage(diagnostic);
      this.firstError = diagnostic;
    }
    return Err(diagnostic);
  }

  /** Error in strict mode, warning in tolerant mode. */
  softViolation(kind: ViolationKind, location: Location, expected: string, actual?: string): Result<void, Diagnostic> {
    return this.strict
      ? this.error(kind, location, expected, actual)
      : this.warn(kind, location, expected, actual);
  }

  /** Records a violation with the severity `classify` assigns to its kind. */
  raise(kind: ViolationKind, location: Location, expected: string, actual?: string): Result<void, Diagnostic> {
    return classify(kind, this.strict) === 'error'
      ? this.error(kind, location, expected, actual)
      : this.warn(kind, location, expected, actual);
  }
}
