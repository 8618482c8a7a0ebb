#!/usr/bin/env node
import { env } from './config/env';
import { BillAnalysisError } from './errors';
import { analyzeBill } from './services/analysisService';
import { formatSummaryReport, writeBillArtifacts } from './services/reportService';

const main = async (billPath: string) => {
  console.info(`[CLI] Processing bill from: ${billPath}`);

  const analysis = await analyzeBill(billPath, {
    summaryPage: env.summaryPageNumber,
    totalsPage: env.totalsPageNumber,
    familyCount: env.familyCount,
    planCostForAllMembers: env.planCostForAllMembers,
    memberNames: env.memberNames,
  });

  writeBillArtifacts(analysis.allocations, analysis.billingPeriod, {
    csvPath: env.summarizedBillPath,
    billingPeriodPath: env.billingPeriodPath,
  });

  console.log(formatSummaryReport(analysis.allocations, analysis.billingPeriod));
  console.info('[CLI] Processing completed successfully');
};

/** Runs one split; failures are logged and reported through the exit code. */
export const runCli = (argv: string[] = process.argv.slice(2)): Promise<void> =>
  main(argv[0] ?? env.billPath).catch((error: unknown) => {
    if (error instanceof BillAnalysisError) {
      console.error(`[CLI] ${error.kind}: ${error.message}`, error.details);
    } else {
      console.error('[CLI] Bill analysis failed', error);
    }
    process.exitCode = 1;
  });

if (require.main === module) {
  void runCli();
}
