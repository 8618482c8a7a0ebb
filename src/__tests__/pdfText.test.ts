import { ExtractionError } from '../errors';
import { extractBillingPeriod, extractPageLines, splitPageText } from '../services/pdfText';
import { fakeDocument, linesOf } from './helpers/fixtures';

describe('splitPageText', () => {
  it('trims lines, drops blank ones and numbers the rest', () => {
    expect(splitPageText('  TOTAL DUE \n\n   \n$12.00\r\nDue soon')).toEqual([
      { content: 'TOTAL DUE', position: 0 },
      { content: '$12.00', position: 1 },
      { content: 'Due soon', position: 2 },
    ]);
  });

  it('turns non-breaking spaces into plain spaces', () => {
    expect(splitPageText('(555)\u00a0010-0001 Voice')[0].content).toBe('(555) 010-0001 Voice');
  });
});

describe('extractPageLines', () => {
  it('returns the lines of the requested zero-based page', async () => {
    const document = fakeDocument(['cover', 'THIS BILL SUMMARY\n  Account $1.00 - - - $1.00 ']);

    await expect(extractPageLines(document, 1)).resolves.toEqual([
      { content: 'THIS BILL SUMMARY', position: 0 },
      { content: 'Account $1.00 - - - $1.00', position: 1 },
    ]);
  });

  it('joins text items that share a line', async () => {
    const document = {
      numPages: 1,
      getPage: async () => ({
        getTextContent: async () => ({
          items: [
            { str: '(555) ', hasEOL: false },
            { str: '010-0001', hasEOL: false },
            { type: 'beginMarkedContent' },
            { str: ' Voice', hasEOL: true },
            { str: 'TOTAL DUE', hasEOL: true },
          ],
        }),
      }),
    };

    await expect(extractPageLines(document, 0)).resolves.toEqual([
      { content: '(555) 010-0001 Voice', position: 0 },
      { content: 'TOTAL DUE', position: 1 },
    ]);
  });

  it.each([-1, 2, 0.5])('rejects page index %p', async (pageIndex) => {
    await expect(extractPageLines(fakeDocument(['a', 'b']), pageIndex)).rejects.toThrow(
      ExtractionError
    );
  });

  it('rejects a page without a text layer', async () => {
    await expect(extractPageLines(fakeDocument(['  \n ']), 0)).rejects.toThrow(
      'Page 0 has no text layer'
    );
  });
});

describe('extractBillingPeriod', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads the label after "Here\'s your bill for" without the trailing period', () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    expect(extractBillingPeriod(linesOf('Hi Alex,', "Here's your bill for March 2025."))).toBe(
      'March 2025'
    );
  });

  it('accepts a typographic apostrophe', () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    expect(extractBillingPeriod(linesOf('Here’s your bill for February 2025.'))).toBe(
      'February 2025'
    );
  });

  it('logs and returns null when the sentence is missing', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(extractBillingPeriod(linesOf('TOTAL DUE', '$12.00'))).toBeNull();
    expect(warn).toHaveBeenCalledWith('[Extractor] Billing period not found in the document');
  });
});
