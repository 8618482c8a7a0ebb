export type TableLayout = 'header-delimited' | 'token-grid';

export interface RawLine {
  content: string;
  position: number;
}

export type TableWindow =
  | { layout: 'header-delimited'; lines: RawLine[] }
  | { layout: 'token-grid'; rows: string[][] };

export interface SummaryRow {
  identifier: string;
  lineType: string;
  plans: string;
  equipment: string;
  services: string;
  oneTimeCharges: string;
  total: string;
}

export interface AllocatedRow {
  member: string;
  total: number;
  planPrice: number;
  equipment: number;
  services: number;
  oneTimeCharges: number;
}

export type MemberNames = Record<string, string>;

export interface AllocationOptions {
  planCostForAllMembers: boolean;
  memberNames?: MemberNames;
}

export interface AnalyzeBillOptions extends AllocationOptions {
  summaryPage: number;
  totalsPage: number;
  familyCount: number;
}

export interface BillAnalysis {
  billingPeriod: string | null;
  layout: TableLayout;
  summaryRows: SummaryRow[];
  allocations: AllocatedRow[];
  statedTotal: number;
}

export interface BillUploadPayload extends AnalyzeBillOptions {
  storedFilePath: string;
  originalFilename?: string;
}
