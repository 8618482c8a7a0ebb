import { TableNotFoundError, TableShapeError } from '../errors';
import type { RawLine, TableLayout, TableWindow } from '../types/bill';

export const SUMMARY_ANCHOR = 'THIS BILL SUMMARY';
export const DETAILED_CHARGES_ANCHOR = 'DETAILED CHARGES';
export const ACCOUNT_ANCHOR = 'Account';
export const GRID_WIDTH = 7;

// pdf text layers sometimes kern "Totals" into "T otals"
const TOTALS_ROW = /^T ?otals\b/;

type LocateStrategy = (lines: RawLine[], familyCount: number) => TableWindow;

/** Index of the nth line equal to `target`, or -1. */
export const findNthOccurrence = (lines: RawLine[], target: string, n = 1): number => {
  let count = 0;
  for (let index = 0; index < lines.length; index += 1) {
    if (lines[index].content === target) {
      count += 1;
      if (count === n) return index;
    }
  }
  return -1;
};

const isTotalsRow = (content: string): boolean => {
  if (!TOTALS_ROW.test(content)) return false;
  console.info('[Locator] Skipping totals row', { content });
  return true;
};

export const locateHeaderDelimited: LocateStrategy = (lines) => {
  const summaryIndex = findNthOccurrence(lines, SUMMARY_ANCHOR);
  const detailedIndex = findNthOccurrence(lines, DETAILED_CHARGES_ANCHOR);

  if (summaryIndex === -1 || detailedIndex === -1) {
    throw new TableNotFoundError('Summary table anchors not found', {
      [SUMMARY_ANCHOR]: summaryIndex,
      [DETAILED_CHARGES_ANCHOR]: detailedIndex,
    });
  }

  // the line right after the anchor holds the column headers
  const body = lines
    .slice(summaryIndex + 2, detailedIndex)
    .filter((line) => !isTotalsRow(line.content));
  if (!body.length) {
    throw new TableShapeError('Summary table window is empty', {
      start: summaryIndex + 2,
      end: detailedIndex,
    });
  }

  return { layout: 'header-delimited', lines: body };
};

const padRow = (cells: string[]): string[] => {
  const row = [...cells];
  while (row.length < GRID_WIDTH) {
    row.splice(row.length - 1, 0, '-');
  }
  return row;
};

export const locateTokenGrid: LocateStrategy = (lines, familyCount) => {
  const startIndex = findNthOccurrence(lines, ACCOUNT_ANCHOR, 2);
  const endIndex = findNthOccurrence(lines, DETAILED_CHARGES_ANCHOR);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    throw new TableNotFoundError('Token grid anchors not found', {
      [ACCOUNT_ANCHOR]: startIndex,
      [DETAILED_CHARGES_ANCHOR]: endIndex,
    });
  }

  let cells = lines.slice(startIndex, endIndex).map((line) => line.content);
  const totalsIndex = cells.findIndex(isTotalsRow);
  if (totalsIndex !== -1) {
    cells = cells.slice(0, totalsIndex);
  }

  if (!Number.isInteger(familyCount) || familyCount < 0) {
    throw new TableShapeError(`Family count must be a non-negative integer, got ${familyCount}`, {
      familyCount,
    });
  }
  const expectedRows = familyCount + 1;
  if (!cells.length || cells.length % expectedRows !== 0) {
    throw new TableShapeError(
      `Token grid has ${cells.length} cells, which cannot be split into ${expectedRows} rows`,
      { observedCells: cells.length, expectedRows }
    );
  }

  const width = cells.length / expectedRows;
  if (width > GRID_WIDTH) {
    throw new TableShapeError(
      `Token grid rows have ${width} cells, more than the ${GRID_WIDTH} columns of the summary table`,
      { observedCells: cells.length, expectedRows, observedWidth: width, expectedWidth: GRID_WIDTH }
    );
  }

  const rows: string[][] = [];
  for (let offset = 0; offset < cells.length; offset += width) {
    rows.push(padRow(cells.slice(offset, offset + width)));
  }

  return { layout: 'token-grid', rows };
};

const strategies: Record<TableLayout, LocateStrategy> = {
  'header-delimited': locateHeaderDelimited,
  'token-grid': locateTokenGrid,
};

const strategyOrder: TableLayout[] = ['header-delimited', 'token-grid'];

/**
 * Finds the billing summary table, trying the header-delimited layout first
 * and the token grid second. Only a missing anchor moves on to the next
 * layout; a shape error in a layout whose anchors were found is final.
 */
export const locateTable = (lines: RawLine[], familyCount: number): TableWindow => {
  let lastError: TableNotFoundError | undefined;

  for (const layout of strategyOrder) {
    try {
      const window = strategies[layout](lines, familyCount);
      console.info(`[Locator] Summary table located using the ${layout} layout`);
      return window;
    } catch (error) {
      if (!(error instanceof TableNotFoundError)) throw error;
      lastError = error;
    }
  }

  throw lastError ?? new TableNotFoundError('No table layout matched the page');
};
