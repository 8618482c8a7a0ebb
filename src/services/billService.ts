import { z } from 'zod';
import { db } from '../db/connection';
import type {
  AllocatedRow,
  BillAnalysis,
  BillUploadPayload,
  TableLayout,
} from '../types/bill';
import { analyzeBill } from './analysisService';
import { formatSummaryReport, toCsv } from './reportService';

interface BillRow {
  id: number;
  uploaded_at: string;
  original_filename?: string;
  file_path?: string;
  billing_period: string | null;
  layout: TableLayout;
  family_count: number;
  plan_cost_for_all_members: number;
  stated_total: number;
}

interface AllocationRow {
  id: number;
  bill_id: number;
  position: number;
  member: string;
  total: number;
  plan_price: number;
  equipment: number;
  services: number;
  one_time_charges: number;
}

export interface BillDetail extends Omit<BillRow, 'plan_cost_for_all_members'> {
  plan_cost_for_all_members: boolean;
  allocations: AllocatedRow[];
}

const billUploadSchema = z.object({
  storedFilePath: z.string().min(1),
  originalFilename: z.string().optional(),
  familyCount: z.number().int().nonnegative(),
  summaryPage: z.number().int().nonnegative(),
  totalsPage: z.number().int().nonnegative(),
  planCostForAllMembers: z.boolean(),
  memberNames: z.record(z.string(), z.string()).optional(),
});

type BillUpload = z.infer<typeof billUploadSchema>;

const toAllocatedRow = (row: AllocationRow): AllocatedRow => ({
  member: row.member,
  total: row.total,
  planPrice: row.plan_price,
  equipment: row.equipment,
  services: row.services,
  oneTimeCharges: row.one_time_charges,
});

const insertAllocations = (billId: number, allocations: AllocatedRow[]) => {
  const insertAllocation = db.prepare(
    `INSERT INTO allocations (bill_id, position, member, total, plan_price, equipment, services, one_time_charges)
     VALUES (@billId, @position, @member, @total, @planPrice, @equipment, @services, @oneTimeCharges)`
  );

  allocations.forEach((allocation, position) => {
    insertAllocation.run({ billId, position, ...allocation });
  });
};

/** Stores a reconciled analysis; the bill and its rows are written together or not at all. */
export const saveBillAnalysis = (analysis: BillAnalysis, upload: BillUpload): BillDetail => {
  const insertBill = db.prepare(
    `INSERT INTO bills (original_filename, file_path, billing_period, layout, family_count, plan_cost_for_all_members, stated_total)
     VALUES (@originalFilename, @filePath, @billingPeriod, @layout, @familyCount, @planCostForAllMembers, @statedTotal)`
  );

  const persist = db.transaction(() => {
    const result = insertBill.run({
      originalFilename: upload.originalFilename ?? null,
      filePath: upload.storedFilePath,
      billingPeriod: analysis.billingPeriod,
      layout: analysis.layout,
      familyCount: upload.familyCount,
      planCostForAllMembers: upload.planCostForAllMembers ? 1 : 0,
      statedTotal: analysis.statedTotal,
    });
    const billId = Number(result.lastInsertRowid);
    insertAllocations(billId, analysis.allocations);
    return billId;
  });

  const bill = getBillById(persist());
  if (!bill) {
    throw new Error('Bill could not be stored');
  }
  return bill;
};

export const createBillFromUpload = async (payload: BillUploadPayload): Promise<BillDetail> => {
  const data = billUploadSchema.parse(payload);
  const analysis = await analyzeBill(data.storedFilePath, data);
  return saveBillAnalysis(analysis, data);
};

export const getBillById = (billId: number): BillDetail | null => {
  const bill = db.prepare('SELECT * FROM bills WHERE id = ?').get(billId) as BillRow | undefined;
  if (!bill) return null;

  const allocationRows = db
    .prepare('SELECT * FROM allocations WHERE bill_id = ? ORDER BY position')
    .all(billId) as AllocationRow[];

  return {
    ...bill,
    plan_cost_for_all_members: bill.plan_cost_for_all_members === 1,
    allocations: allocationRows.map(toAllocatedRow),
  };
};

export const getBillSummaryReport = (billId: number): string | null => {
  const bill = getBillById(billId);
  return bill ? formatSummaryReport(bill.allocations, bill.billing_period) : null;
};

export const getBillCsv = (billId: number): string | null => {
  const bill = getBillById(billId);
  return bill ? toCsv(bill.allocations) : null;
};
