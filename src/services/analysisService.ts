import type { AnalyzeBillOptions, BillAnalysis } from '../types/bill';
import { allocateCharges } from './allocationService';
import { loadPdfDocument, type PdfDocumentLike } from './pdfLoader';
import { extractBillingPeriod, extractPageLines } from './pdfText';
import { assertReconciled, findStatedTotal } from './reconciliationService';
import { parseTableWindow } from './rowParser';
import { locateTable } from './tableLocator';

/**
 * Runs extraction, allocation and reconciliation over an open document.
 * Nothing is returned unless the allocated totals add up to TOTAL DUE.
 */
export const analyzeBillDocument = async (
  document: PdfDocumentLike,
  options: AnalyzeBillOptions
): Promise<BillAnalysis> => {
  const totalsLines = await extractPageLines(document, options.totalsPage);
  const billingPeriod = extractBillingPeriod(totalsLines);

  const summaryLines =
    options.summaryPage === options.totalsPage
      ? totalsLines
      : await extractPageLines(document, options.summaryPage);

  const window = locateTable(summaryLines, options.familyCount);
  const summaryRows = parseTableWindow(window, options.familyCount);
  const allocations = allocateCharges(summaryRows, options);

  const statedTotal = findStatedTotal(totalsLines);
  assertReconciled(allocations, statedTotal);

  return { billingPeriod, layout: window.layout, summaryRows, allocations, statedTotal };
};

export const analyzeBill = async (
  filePath: string,
  options: AnalyzeBillOptions
): Promise<BillAnalysis> => {
  console.info(`[Pipeline] Reading summary table from page ${options.summaryPage} of ${filePath}`);
  const document = await loadPdfDocument(filePath);
  try {
    return await analyzeBillDocument(document, options);
  } finally {
    await document.destroy?.();
  }
};
