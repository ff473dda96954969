/**
 * Text Extractor
 * Turns PDF bytes into ordered, UTF-8-safe page text.
 */

import { ExtractionError, errorMessage } from '../errors.js';
import type { Page } from './types.js';

// A high surrogate not followed by a low one, or a low surrogate not preceded by a high one
const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Drop characters that cannot be encoded as UTF-8.
 * Nothing is substituted, so the remaining text keeps its order.
 */
export function sanitizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text.replace(UNPAIRED_SURROGATE, '');
}

/**
 * Extract the text of every page using unpdf.
 */
export async function extractPages(bytes: Uint8Array): Promise<Page[]> {
  let pageTexts: string[];
  try {
    // Dynamic import for unpdf
    const { extractText, getDocumentProxy } = await import('unpdf');

    // pdf.js may take ownership of the buffer, so hand it a copy
    const pdf = await getDocumentProxy(new Uint8Array(bytes));
    const { text } = await extractText(pdf, { mergePages: false });
    pageTexts = text;
  } catch (error) {
    throw new ExtractionError(`Failed to parse PDF: ${errorMessage(error)}`, { cause: error });
  }

  return pageTexts.map((text, index) => ({ index, text: sanitizeText(text) }));
}
