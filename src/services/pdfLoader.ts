import fs from 'fs/promises';
import { getDocument } from 'pdfjs-dist';
import { ExtractionError } from '../errors';

export interface PdfTextItemLike {
  str: string;
  hasEOL?: boolean;
}

export interface PdfMarkedContentLike {
  type: string;
}

export interface PdfPageLike {
  getTextContent(): Promise<{ items: Array<PdfTextItemLike | PdfMarkedContentLike> }>;
}

/** The slice of a pdfjs document the text extractor reads. */
export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy?(): Promise<void>;
}

export const loadPdfDocument = async (filePath: string): Promise<PdfDocumentLike> => {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    throw new ExtractionError(`Could not read PDF at ${filePath}: ${String(error)}`, {
      filePath,
    });
  }

  try {
    return await getDocument({ data, disableFontFace: true, isEvalSupported: false }).promise;
  } catch (error) {
    const message = String(error);
    if (message.includes('password') || message.includes('encrypted')) {
      throw new ExtractionError('The bill PDF is password-protected', { filePath });
    }
    throw new ExtractionError(`PDF processing failed: ${message}`, { filePath });
  }
};
