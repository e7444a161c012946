/**
 * Line-oriented PDF text extraction using pdfjs-dist.
 *
 * Statements are read as ordered pages of ordered text lines. Lines are
 * assembled in content-stream order and broken where pdfjs marks an end of
 * line; whitespace inside a line is kept as the PDF has it.
 */
import { readFile } from 'fs/promises';

export interface ExtractedPage {
  pageNumber: number;
  lines: string[];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  totalPages: number;
}

/**
 * Internal interface for pdfjs text items.
 */
interface PdfjsTextItemLike {
  str: string;
  hasEOL: boolean;
}

interface PdfjsPage {
  getTextContent(): Promise<{ items: unknown[] }>;
}

interface PdfjsDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPage>;
  destroy(): Promise<void>;
}

interface PdfjsModule {
  getDocument(params: { data: Uint8Array; useSystemFonts?: boolean; verbosity?: number }): {
    promise: Promise<PdfjsDocument>;
  };
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'hasEOL' in item &&
    typeof item.hasEOL === 'boolean'
  );
}

/**
 * Join text items into lines. An item flagged with an end of line closes the
 * current line; trailing text without one forms the last line.
 */
export function buildLinesFromItems(items: unknown[]): string[] {
  const lines: string[] = [];
  let current = '';
  let open = false;

  for (const item of items) {
    // Marked-content entries carry no text
    if (!isTextItem(item)) continue;

    current += item.str;
    open = true;
    if (item.hasEOL) {
      lines.push(current);
      current = '';
      open = false;
    }
  }

  if (open) {
    lines.push(current);
  }
  return lines;
}

export async function extractPDFFromBuffer(buffer: Buffer | Uint8Array): Promise<ExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM only)
  const pdfjs: PdfjsModule = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = buffer instanceof Buffer ? new Uint8Array(buffer) : buffer;
  const pdfDocument = await pdfjs.getDocument({ data, useSystemFonts: true, verbosity: 0 }).promise;

  try {
    const pages: ExtractedPage[] = [];
    for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber++) {
      const page = await pdfDocument.getPage(pageNumber);
      const textContent = await page.getTextContent();
      pages.push({ pageNumber, lines: buildLinesFromItems(textContent.items) });
    }
    return { pages, totalPages: pdfDocument.numPages };
  } finally {
    await pdfDocument.destroy();
  }
}

export async function extractPDF(filePath: string): Promise<ExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractPDFFromBuffer(dataBuffer);
}

/**
 * Read a statement PDF as the page/line structure the statement parser takes.
 */
export async function readPdfPages(filePath: string): Promise<string[][]> {
  const pdf = await extractPDF(filePath);
  return pdf.pages.map((page) => page.lines);
}
