jest.mock('../services/pdfLoader', () => ({
  loadPdfDocument: jest.fn(),
}));

import { ReconciliationMismatchError, TableShapeError } from '../errors';
import { analyzeBill, analyzeBillDocument } from '../services/analysisService';
import { loadPdfDocument } from '../services/pdfLoader';
import { toCsv } from '../services/reportService';
import type { AnalyzeBillOptions } from '../types/bill';
import { fakeDocument, readFixture } from './helpers/fixtures';

const options: AnalyzeBillOptions = {
  summaryPage: 1,
  totalsPage: 0,
  familyCount: 4,
  planCostForAllMembers: false,
  memberNames: { '(555) 010-0001': 'Alex' },
};

const familyBill = () => fakeDocument([readFixture('cover-page.txt'), readFixture('summary-page.txt')]);

describe('bill analysis pipeline', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('extracts, allocates and reconciles a header-delimited bill', async () => {
    const analysis = await analyzeBillDocument(familyBill(), options);

    expect(analysis.billingPeriod).toBe('March 2025');
    expect(analysis.layout).toBe('header-delimited');
    expect(analysis.statedTotal).toBe(313.14);
    expect(analysis.summaryRows).toHaveLength(5);
    expect(analysis.allocations.map((row) => row.member)).toEqual([
      'Alex',
      '(555) 010-0002',
      '(555) 010-0003',
      '(555) 010-0004',
    ]);
    expect(analysis.allocations.map((row) => row.planPrice)).toEqual([60, 60, 60, 80]);
  });

  it('handles the token-grid layout', async () => {
    const document = fakeDocument([
      readFixture('grid-cover-page.txt'),
      readFixture('grid-summary-page.txt'),
    ]);

    const analysis = await analyzeBillDocument(document, { ...options, familyCount: 2 });

    expect(analysis.billingPeriod).toBe('February 2025');
    expect(analysis.layout).toBe('token-grid');
    expect(analysis.allocations).toEqual([
      { member: 'Alex', total: 70, planPrice: 50, equipment: 20, services: 0, oneTimeCharges: 0 },
      {
        member: '(555) 010-0002',
        total: 54.5,
        planPrice: 50,
        equipment: 0,
        services: 4.5,
        oneTimeCharges: 0,
      },
    ]);
  });

  it('produces identical output when run twice on the same bill', async () => {
    const first = await analyzeBillDocument(familyBill(), options);
    const second = await analyzeBillDocument(familyBill(), options);
    expect(toCsv(second.allocations)).toBe(toCsv(first.allocations));
  });

  it('stops when the allocations do not add up to TOTAL DUE', async () => {
    const cover = readFixture('cover-page.txt').replace('$313.14', '$313.15');
    const document = fakeDocument([cover, readFixture('summary-page.txt')]);

    await expect(analyzeBillDocument(document, options)).rejects.toThrow(
      ReconciliationMismatchError
    );
  });

  it('surfaces a malformed token grid', async () => {
    const document = fakeDocument([
      readFixture('grid-cover-page.txt'),
      readFixture('grid-summary-page.txt'),
    ]);

    await expect(analyzeBillDocument(document, { ...options, familyCount: 3 })).rejects.toThrow(
      new TableShapeError('Token grid has 18 cells, which cannot be split into 4 rows')
    );
  });

  it('reads the summary from the totals page when both indexes match', async () => {
    const singlePage = `${readFixture('cover-page.txt')}\n${readFixture('summary-page.txt')}`;
    const analysis = await analyzeBillDocument(fakeDocument([singlePage]), {
      ...options,
      summaryPage: 0,
    });
    expect(analysis.allocations).toHaveLength(4);
  });

  it('opens the PDF from disk and releases it afterwards', async () => {
    const document = familyBill();
    jest.mocked(loadPdfDocument).mockResolvedValue(document);

    const analysis = await analyzeBill('/bills/march.pdf', options);

    expect(loadPdfDocument).toHaveBeenCalledWith('/bills/march.pdf');
    expect(analysis.statedTotal).toBe(313.14);
    expect(document.destroy).toHaveBeenCalledTimes(1);
  });

  it('releases the PDF when the analysis fails', async () => {
    const document = fakeDocument(['no totals here', readFixture('summary-page.txt')]);
    jest.mocked(loadPdfDocument).mockResolvedValue(document);

    await expect(analyzeBill('/bills/broken.pdf', options)).rejects.toThrow('"TOTAL DUE" not found');
    expect(document.destroy).toHaveBeenCalledTimes(1);
  });
});
