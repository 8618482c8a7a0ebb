export type BillAnalysisErrorKind =
  | 'ExtractionError'
  | 'TableNotFoundError'
  | 'TableShapeError'
  | 'MissingAccountRowError'
  | 'InvalidTableStructureError'
  | 'InvalidTableFormatError'
  | 'CurrencyParseError'
  | 'ReconciliationMismatchError';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure the bill pipeline surfaces to its caller.
 * `details` holds the offending value and the invariant it broke.
 */
export abstract class BillAnalysisError extends Error {
  abstract readonly kind: BillAnalysisErrorKind;

  constructor(
    message: string,
    readonly details: ErrorDetails = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ExtractionError extends BillAnalysisError {
  readonly kind = 'ExtractionError';
}

export class TableNotFoundError extends BillAnalysisError {
  readonly kind = 'TableNotFoundError';
}

export class TableShapeError extends BillAnalysisError {
  readonly kind = 'TableShapeError';
}

export class MissingAccountRowError extends BillAnalysisError {
  readonly kind = 'MissingAccountRowError';
}

export class InvalidTableStructureError extends BillAnalysisError {
  readonly kind = 'InvalidTableStructureError';
}

export class InvalidTableFormatError extends BillAnalysisError {
  readonly kind = 'InvalidTableFormatError';
}

export class CurrencyParseError extends BillAnalysisError {
  readonly kind = 'CurrencyParseError';
}

export class ReconciliationMismatchError extends BillAnalysisError {
  readonly kind = 'ReconciliationMismatchError';
}
