import { CurrencyParseError, ExtractionError, ReconciliationMismatchError } from '../errors';
import type { AllocatedRow, RawLine } from '../types/bill';
import { formatUsd, parseCurrency } from './currency';
import { sumTotals } from './allocationService';
import { findNthOccurrence } from './tableLocator';

export const TOTAL_DUE_ANCHOR = 'TOTAL DUE';
export const RECONCILIATION_TOLERANCE = 1e-6;

/** Reads the amount printed on the line after the first `TOTAL DUE`. */
export const findStatedTotal = (lines: RawLine[]): number => {
  const anchorIndex = findNthOccurrence(lines, TOTAL_DUE_ANCHOR);
  if (anchorIndex === -1) {
    throw new ExtractionError(`"${TOTAL_DUE_ANCHOR}" not found on the totals page`);
  }

  const valueLine = lines[anchorIndex + 1];
  if (!valueLine) {
    throw new ExtractionError(`No amount follows "${TOTAL_DUE_ANCHOR}"`, { anchorIndex });
  }

  try {
    return parseCurrency(valueLine.content);
  } catch (error) {
    if (!(error instanceof CurrencyParseError)) throw error;
    throw new ExtractionError(`Unreadable ${TOTAL_DUE_ANCHOR} amount "${valueLine.content}"`, {
      value: valueLine.content,
    });
  }
};

export const assertReconciled = (rows: readonly AllocatedRow[], statedTotal: number): void => {
  const computedTotal = sumTotals(rows);
  const difference = computedTotal - statedTotal;

  if (!(Math.abs(difference) < RECONCILIATION_TOLERANCE)) {
    console.error('[Reconcile] Allocated totals do not match the bill', {
      computedTotal,
      statedTotal,
    });
    throw new ReconciliationMismatchError(
      `Total bill does not match: ${computedTotal} != ${statedTotal}`,
      { computedTotal, statedTotal, difference, tolerance: RECONCILIATION_TOLERANCE }
    );
  }

  console.info(`[Reconcile] Allocated totals match the bill total of ${formatUsd(statedTotal)}`);
};
