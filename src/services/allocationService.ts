import { z } from 'zod';
import {
  CurrencyParseError,
  InvalidTableFormatError,
  InvalidTableStructureError,
  MissingAccountRowError,
} from '../errors';
import type { AllocatedRow, AllocationOptions, SummaryRow } from '../types/bill';
import { formatUsd, INCLUDED_PLAN, parseCurrency } from './currency';
import { ACCOUNT_ANCHOR } from './tableLocator';

type AmountColumn = 'plans' | 'equipment' | 'services' | 'oneTimeCharges';

interface MemberCharges {
  identifier: string;
  /** null for members whose plan is bundled into the Account lump sum */
  plan: number | null;
  equipment: number;
  services: number;
  oneTimeCharges: number;
}

const summaryRowSchema = z.object({
  identifier: z.string(),
  lineType: z.string(),
  plans: z.string(),
  equipment: z.string(),
  services: z.string(),
  oneTimeCharges: z.string(),
  total: z.string(),
});

/** Validates rows that arrive from outside the parser, e.g. a JSON request body. */
export const readSummaryRows = (input: unknown): SummaryRow[] => {
  const result = z.array(summaryRowSchema).safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const column = issue.path.length ? issue.path.join('.') : 'rows';
  console.error(`[Allocation] Missing required column: ${column}`);
  throw new InvalidTableStructureError(`Invalid table structure - ${column} not found`, {
    path: issue.path,
    reason: issue.message,
  });
};

export const sumTotals = (rows: readonly AllocatedRow[]): number =>
  rows.reduce((sum, row) => sum + row.total, 0);

const readAmount = (row: SummaryRow, column: AmountColumn): number => {
  try {
    return parseCurrency(row[column]);
  } catch (error) {
    if (!(error instanceof CurrencyParseError)) throw error;
    throw new CurrencyParseError(`${column} of ${row.identifier}: ${error.message}`, {
      ...error.details,
      identifier: row.identifier,
      column,
    });
  }
};

const readAccountLumpSum = (rows: readonly SummaryRow[]): number => {
  const accountRows = rows.filter((row) => row.identifier === ACCOUNT_ANCHOR);

  if (!accountRows.length) {
    console.error("[Allocation] Missing 'Account' row in input table");
    throw new MissingAccountRowError('Invalid table format - no account summary row', {
      identifiers: rows.map((row) => row.identifier),
    });
  }
  if (accountRows.length > 1) {
    throw new InvalidTableFormatError(
      `Invalid table format - expected one account summary row, found ${accountRows.length}`,
      { accountRows: accountRows.length }
    );
  }

  const [account] = accountRows;
  if (account.plans === INCLUDED_PLAN) {
    throw new InvalidTableFormatError('Invalid table format - account plan price missing', {
      plans: account.plans,
    });
  }
  try {
    return parseCurrency(account.plans);
  } catch (error) {
    if (!(error instanceof CurrencyParseError)) throw error;
    console.error('[Allocation] Account row has no readable plan price');
    throw new InvalidTableFormatError('Invalid table format - account plan price missing', {
      plans: account.plans,
    });
  }
};

const readMemberCharges = (row: SummaryRow): MemberCharges => ({
  identifier: row.identifier.replace(/\u00a0/g, ' '),
  plan: row.plans === INCLUDED_PLAN ? null : readAmount(row, 'plans'),
  equipment: readAmount(row, 'equipment'),
  services: readAmount(row, 'services'),
  oneTimeCharges: readAmount(row, 'oneTimeCharges'),
});

const resolvePlanPrices = (
  members: MemberCharges[],
  lumpSum: number,
  planCostForAllMembers: boolean
): ((member: MemberCharges) => number) => {
  const included = members.filter((member) => member.plan === null);

  if (planCostForAllMembers) {
    const individualTotal = members.reduce((sum, member) => sum + (member.plan ?? 0), 0);
    const shared = (lumpSum + individualTotal) / members.length;
    return () => shared;
  }

  if (!included.length && lumpSum !== 0) {
    throw new InvalidTableFormatError(
      `Invalid table format - account plan price ${formatUsd(lumpSum)} has no included members to split across`,
      { lumpSum }
    );
  }
  const perIncluded = included.length ? lumpSum / included.length : 0;
  return (member) => member.plan ?? perIncluded;
};

/**
 * Splits the bill across members.
 *
 * With `planCostForAllMembers` every member pays the same plan price: the
 * Account lump sum plus every individually priced plan, divided by the member
 * count. Otherwise members marked `Included` split the lump sum and the rest
 * keep their own plan price. Equipment, services and one-time charges always
 * stay with the line they were billed to.
 */
export const allocateCharges = (
  rows: readonly SummaryRow[],
  { planCostForAllMembers, memberNames = {} }: AllocationOptions
): AllocatedRow[] => {
  const lumpSum = readAccountLumpSum(rows);
  const members = rows.filter((row) => row.identifier !== ACCOUNT_ANCHOR).map(readMemberCharges);

  if (!members.length) {
    console.warn('[Allocation] Summary table has no member rows');
    return [];
  }

  const planPriceFor = resolvePlanPrices(members, lumpSum, planCostForAllMembers);

  const allocations = members.map((member): AllocatedRow => {
    const planPrice = planPriceFor(member);
    return {
      member: Object.hasOwn(memberNames, member.identifier)
        ? memberNames[member.identifier]
        : member.identifier,
      total: planPrice + member.equipment + member.services + member.oneTimeCharges,
      planPrice,
      equipment: member.equipment,
      services: member.services,
      oneTimeCharges: member.oneTimeCharges,
    };
  });

  console.info(`[Allocation] Total bill sums up to ${formatUsd(sumTotals(allocations))}`);
  return allocations;
};
