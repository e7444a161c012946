// PDF text extraction (pdfjs-dist)
export {
  extractPDF,
  extractPDFFromBuffer,
  readPdfPages,
  buildLinesFromItems,
} from './pdf-extractor.js';

export type { ExtractedPage, ExtractedPDF } from './pdf-extractor.js';
