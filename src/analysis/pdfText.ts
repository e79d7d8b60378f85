import { createRequire } from 'node:module';
import type pdfParse from 'pdf-parse';

const require = createRequire(import.meta.url);

let pdfParseFn: typeof pdfParse | null = null;

// Loaded on first use: the package entry point runs a self-test when it is
// imported as an ES module, so it goes through require instead.
const getPdfParse = (): typeof pdfParse => {
  if (!pdfParseFn) {
    const loaded: typeof pdfParse = require('pdf-parse');
    pdfParseFn = loaded;
  }
  return pdfParseFn;
};

/**
 * Extracts the plain text of every page, in page order.
 */
export async function extractPdfText(bytes: Uint8Array): Promise<string> {
  const result = await getPdfParse()(Buffer.from(bytes));
  return result.text;
}
