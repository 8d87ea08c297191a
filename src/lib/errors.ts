export type ValidationKind = 'input' | 'reference' | 'consistency';

const KIND_LABELS: Record<ValidationKind, string> = {
  input: 'Input validation',
  reference: 'Reference validation',
  consistency: 'Consistency validation',
};

/**
 * Raised before any write when the CSV cannot be imported as-is.
 * `issues` holds every problem found, not just the first.
 */
export class ImportValidationError extends Error {
  readonly kind: ValidationKind;
  readonly issues: string[];

  constructor(kind: ValidationKind, issues: string[]) {
    super(`${KIND_LABELS[kind]} failed with ${issues.length} issue(s)`);
    this.name = 'ImportValidationError';
    this.kind = kind;
    this.issues = issues;
  }
}

/** A database statement failed mid-run; the transaction has been aborted. */
export class ImportWriteError extends Error {
  readonly step: string;
  readonly context: string;

  constructor(step: string, context: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Insert into ${step} failed (${context}): ${reason}`, { cause });
    this.name = 'ImportWriteError';
    this.step = step;
    this.context = context;
  }
}

/** Bad command-line usage; the CLI prints the message plus usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
