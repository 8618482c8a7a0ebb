import { config } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { MemberNames } from '../types/bill';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
config({ path: path.resolve(process.cwd(), envFile) });

const uploadDir = process.env.UPLOAD_DIR ?? path.resolve(process.cwd(), 'uploads');
if (!fs.existsSync(uploadDir)) {
  fs.mkdirSync(uploadDir, { recursive: true });
}

const memberNamesSchema = z.record(z.string(), z.string());

/** Parses a JSON object of phone number → display name, e.g. `{"(555) 010-0001":"Alex"}`. */
export const parseMemberNames = (raw: string | undefined): MemberNames | undefined => {
  if (!raw?.trim()) return undefined;
  return memberNamesSchema.parse(JSON.parse(raw));
};

export const parseFlag = (raw: string | undefined): boolean => raw === 'true' || raw === '1';

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? 4000),
  sqlitePath: process.env.SQLITE_PATH ?? ':memory:',
  uploadDir,
  billPath: process.env.BILL_PATH ?? path.resolve(process.cwd(), 'attachments', 'bill.pdf'),
  summaryPageNumber: Number(process.env.SUMMARY_PAGE_NUMBER ?? 1),
  totalsPageNumber: Number(process.env.TOTALS_PAGE_NUMBER ?? 0),
  familyCount: Number(process.env.FAMILY_COUNT ?? 0),
  planCostForAllMembers: parseFlag(process.env.PLAN_COST_FOR_ALL_MEMBERS),
  memberNames: parseMemberNames(process.env.MEMBER_NAMES),
  summarizedBillPath: process.env.SUMMARIZED_BILL_PATH ?? 'summarized_bill.csv',
  billingPeriodPath: process.env.BILLING_PERIOD_PATH ?? 'billing_month.txt',
};
