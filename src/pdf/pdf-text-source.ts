/**
 * Flat text extraction from page documents.
 */
import { ConversionError } from '../core/errors.js';

/** Produces one flat text blob from a page document. */
export interface PageTextSource {
  extractText(document: Uint8Array): Promise<string>;
}

/**
 * Text source backed by `pdfjs-dist`.
 *
 * Text items are concatenated in content-stream order; an item flagged as
 * ending a line starts a new one, and pages are separated by a blank line.
 * The library ships as an ES module only and is loaded on first use.
 */
export class PdfJsTextSource implements PageTextSource {
  async extractText(document: Uint8Array): Promise<string> {
    const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

    // pdf.js takes ownership of the buffer it is given. Verbosity 0 keeps
    // its font warnings off the console.
    const task = getDocument({
      data: new Uint8Array(document),
      isEvalSupported: false,
      verbosity: 0,
    });
    const pdf = await task.promise.catch((err: unknown) => {
      throw new ConversionError('Failed to open PDF', { cause: err });
    });

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
        pages.push(text.replace(/\n+$/, ''));
      }
      return pages.join('\n\n');
    } catch (err) {
      throw new ConversionError('Failed to extract text', { cause: err });
    } finally {
      await pdf.destroy();
    }
  }
}
