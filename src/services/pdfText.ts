import { ExtractionError } from '../errors';
import type { RawLine } from '../types/bill';
import type { PdfDocumentLike, PdfMarkedContentLike, PdfTextItemLike } from './pdfLoader';

const BILLING_PERIOD_PATTERN = /Here['’]s your bill for\s+([^\n]+)/;

const isTextItem = (item: PdfTextItemLike | PdfMarkedContentLike): item is PdfTextItemLike =>
  'str' in item;

/** Splits page text into trimmed, non-empty lines, keeping their order. */
export const splitPageText = (text: string): RawLine[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.replace(/\u00a0/g, ' ').trim())
    .filter((line) => line !== '')
    .map((content, position) => ({ content, position }));

export const extractPageLines = async (
  document: PdfDocumentLike,
  pageIndex: number
): Promise<RawLine[]> => {
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= document.numPages) {
    throw new ExtractionError(
      `Page ${pageIndex} is out of range for a document with ${document.numPages} page(s)`,
      { pageIndex, pageCount: document.numPages }
    );
  }

  const page = await document.getPage(pageIndex + 1);
  const content = await page.getTextContent();
  const text = content.items
    .filter(isTextItem)
    .map((item) => (item.hasEOL ? `${item.str}\n` : item.str))
    .join('');

  const lines = splitPageText(text);
  if (!lines.length) {
    throw new ExtractionError(`Page ${pageIndex} has no text layer`, { pageIndex });
  }
  return lines;
};

/**
 * Reads the billing period from the "Here's your bill for ..." sentence on
 * the cover page, without its trailing period.
 */
export const extractBillingPeriod = (lines: RawLine[]): string | null => {
  const text = lines.map((line) => line.content).join('\n');
  const match = BILLING_PERIOD_PATTERN.exec(text);
  const label = match?.[1]?.trim().replace(/\.$/, '').trim();

  if (!label) {
    console.warn('[Extractor] Billing period not found in the document');
    return null;
  }

  console.info(`[Extractor] Billing period extracted: ${label}`);
  return label;
};
