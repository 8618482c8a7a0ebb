import fs from 'fs';
import path from 'path';
import type { PdfDocumentLike } from '../../services/pdfLoader';
import { splitPageText } from '../../services/pdfText';
import type { RawLine } from '../../types/bill';

const fixtureDir = path.resolve(__dirname, '../../../tests/fixtures');

export const readFixture = (name: string): string =>
  fs.readFileSync(path.join(fixtureDir, name), 'utf8');

export const fixtureLines = (name: string): RawLine[] => splitPageText(readFixture(name));

export const linesOf = (...contents: string[]): RawLine[] =>
  contents.map((content, position) => ({ content, position }));

/** In-memory stand-in for a pdfjs document: one text item per line of each page. */
export const fakeDocument = (pages: string[]): PdfDocumentLike & { destroy: jest.Mock } => ({
  numPages: pages.length,
  getPage: async (pageNumber: number) => ({
    getTextContent: async () => ({
      items: [
        { type: 'beginMarkedContent' },
        ...pages[pageNumber - 1].split('\n').map((str) => ({ str, hasEOL: true })),
        { type: 'endMarkedContent' },
      ],
    }),
  }),
  destroy: jest.fn().mockResolvedValue(undefined),
});
