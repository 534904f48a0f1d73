/**
 * Raised for an invalid job descriptor (empty input list, unsafe identifier)
 */
export class JobDescriptorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobDescriptorError';
  }
}

/**
 * Raised when the ledger would become inconsistent: duplicate or unknown
 * identifiers, a second completion, or a malformed ledger file.
 *
 * These are programming or storage errors, not job failures, so the runner
 * lets them propagate.
 */
export class LedgerIntegrityError extends Error {
  constructor(message: string, public override cause?: Error) {
    super(message);
    this.name = 'LedgerIntegrityError';
  }
}
