import fs from 'fs';
import path from 'path';
import type { AllocatedRow } from '../types/bill';
import { formatUsd } from './currency';
import { sumTotals } from './allocationService';

export const CSV_COLUMNS = [
  'member',
  'total',
  'plan_price',
  'equipment',
  'services',
  'one_time_charges',
] as const;

export const DEFAULT_BILLING_PERIOD = 'last month';

const MIDDLE_DOTS = 10;
const AMOUNT_WIDTH = 6;
const RULE_PADDING = 7;

const csvField = (value: string): string =>
  /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/** Amounts are written at full precision, without a currency symbol. */
export const toCsv = (rows: readonly AllocatedRow[]): string => {
  const lines = rows.map((row) =>
    [
      csvField(row.member),
      String(row.total),
      String(row.planPrice),
      String(row.equipment),
      String(row.services),
      String(row.oneTimeCharges),
    ].join(',')
  );
  return `${[CSV_COLUMNS.join(','), ...lines].join('\n')}\n`;
};

export const formatSummaryTable = (rows: readonly AllocatedRow[]): string => {
  const keyWidth = Math.max(0, ...rows.map((row) => row.member.length));
  const rule = '-'.repeat(keyWidth + AMOUNT_WIDTH + MIDDLE_DOTS + RULE_PADDING);
  const dotted = (label: string, value: string) =>
    `${label.padEnd(keyWidth, '.')}${'.'.repeat(MIDDLE_DOTS)}${value}`;

  return [
    rule,
    dotted('Member', 'Amount'),
    rule,
    ...rows.map((row) => dotted(row.member, formatUsd(row.total))),
    rule,
    dotted('Total bill', formatUsd(sumTotals(rows))),
    rule,
  ].join('\n');
};

export const formatSummaryReport = (
  rows: readonly AllocatedRow[],
  billingPeriod: string | null
): string =>
  [
    `Here is how much each member of the family owes for the ${billingPeriod ?? DEFAULT_BILLING_PERIOD} phone bill:`,
    '',
    formatSummaryTable(rows),
  ].join('\n');

export interface ArtifactPaths {
  csvPath: string;
  billingPeriodPath: string;
}

export const writeBillArtifacts = (
  rows: readonly AllocatedRow[],
  billingPeriod: string | null,
  { csvPath, billingPeriodPath }: ArtifactPaths
): void => {
  fs.mkdirSync(path.dirname(path.resolve(csvPath)), { recursive: true });
  fs.writeFileSync(csvPath, toCsv(rows));
  console.info(`[Report] Allocation table saved to ${csvPath}`);

  if (billingPeriod === null) {
    fs.rmSync(billingPeriodPath, { force: true });
    return;
  }
  fs.mkdirSync(path.dirname(path.resolve(billingPeriodPath)), { recursive: true });
  fs.writeFileSync(billingPeriodPath, billingPeriod);
};
