import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, describeError } from './errors.js';
import type { DocumentStore } from './storage.js';
import type { Logger, MergedDocument } from './types.js';

export class TextExtractor {
  constructor(
    private store: DocumentStore,
    private logger: Logger = console
  ) {}

  /**
   * Text of every page in order. An empty string means the PDF opened fine but
   * carries no text layer (scanned or image-only pages).
   */
  async extract(doc: Pick<MergedDocument, 'name'>): Promise<string> {
    let bytes: Uint8Array;
    try {
      bytes = await this.store.read(doc.name);
    } catch (err) {
      throw new ExtractionError(doc.name, `Error reading PDF ${doc.name}: ${describeError(err)}`, { cause: err });
    }

    let text: string;
    try {
      text = await pdfToText(bytes);
    } catch (err) {
      throw new ExtractionError(doc.name, `Error reading PDF ${doc.name}: ${describeError(err)}`, { cause: err });
    }
    this.logger.log(`[extract] ${doc.name}: ${text.length} characters`);
    return text;
  }
}

export async function pdfToText(bytes: Uint8Array): Promise<string> {
  // pdf.js takes ownership of the buffer it is given
  const task = getDocument({
    data: new Uint8Array(bytes),
    disableFontFace: true,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0
  });

  try {
    const pdf = await task.promise;
    if (pdf.numPages === 0) {
      throw new Error('document has no pages');
    }

    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      let pageText = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        pageText += item.str;
        if (item.hasEOL) pageText += '\n';
      }
      pages.push(pageText);
      page.cleanup();
    }
    return pages.join('\n').trim();
  } finally {
    await task.destroy();
  }
}
