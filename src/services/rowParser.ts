import type { SummaryRow, TableWindow } from '../types/bill';
import { ACCOUNT_ANCHOR, GRID_WIDTH } from './tableLocator';

export const VOICE_LINE = 'Voice';

const MEMBER_ROW = /^\((\d+)\)\s*(\d+)-(\d+)\s+Voice\s+(.+)$/;
const PHONE_NUMBER = /^\((\d+)\)\s*(\d+)-(\d+)$/;

const toSummaryRow = (
  identifier: string,
  lineType: string,
  [plans, equipment, services, oneTimeCharges, total]: string[]
): SummaryRow => ({ identifier, lineType, plans, equipment, services, oneTimeCharges, total });

/**
 * Reads one line of the summary table.
 *
 *   "Account $280.00 - $0.00 - $280.00"
 *   "(999) 637-3009 Voice Included - - $0.53 $0.53"
 *
 * Returns null for anything else (column headers, footnotes).
 */
export const parseTableRow = (line: string): SummaryRow | null => {
  if (line.startsWith(ACCOUNT_ANCHOR)) {
    const parts = line.split(/\s+/);
    if (parts.length < 6) return null;
    return toSummaryRow(ACCOUNT_ANCHOR, '', parts.slice(1, 6));
  }

  const match = MEMBER_ROW.exec(line);
  if (!match) return null;

  const [, area, exchange, subscriber, rest] = match;
  const tokens = rest.trim().split(/\s+/);
  if (tokens.length < 5) return null;

  return toSummaryRow(`(${area}) ${exchange}-${subscriber}`, VOICE_LINE, tokens);
};

/**
 * Reads one padded row of the token grid. Amount columns are taken from the
 * right, so the aggregate row's second cell is ignored.
 */
export const parseGridRow = (cells: string[]): SummaryRow | null => {
  if (cells.length !== GRID_WIDTH) return null;
  const amounts = cells.slice(GRID_WIDTH - 5);

  if (cells[0] === ACCOUNT_ANCHOR) {
    return toSummaryRow(ACCOUNT_ANCHOR, '', amounts);
  }

  const phone = PHONE_NUMBER.exec(cells[0]);
  if (!phone || cells[1] !== VOICE_LINE) return null;

  const [, area, exchange, subscriber] = phone;
  return toSummaryRow(`(${area}) ${exchange}-${subscriber}`, VOICE_LINE, amounts);
};

export const parseTableWindow = (window: TableWindow, familyCount: number): SummaryRow[] => {
  const candidates =
    window.layout === 'header-delimited'
      ? window.lines.map((line) => parseTableRow(line.content))
      : window.rows.map(parseGridRow);
  const rows = candidates.filter((row): row is SummaryRow => row !== null);

  const expectedRows = familyCount + 1;
  if (rows.length !== expectedRows) {
    console.warn(
      `[Parser] Expected ${expectedRows} rows but got ${rows.length}. Check the configured family count.`
    );
  }

  console.info(`[Parser] Summary table parsed (${rows.length} rows)`);
  return rows;
};
