import * as cheerio from 'cheerio';
import type { HttpClient } from './http.js';
import { FetchError, describeError } from './errors.js';
import { ensureAbsoluteUrl } from './utils.js';
import type { Logger, PdfReference } from './types.js';

export type PageSource = Pick<HttpClient, 'html'>;

/**
 * Finds the PDF links on a single page. Only the raw href suffix is checked
 * (`a[href$=".pdf"]`, case-sensitive), so `x.PDF` or `x.pdf?v=2` are not picked up.
 */
export class LinkDiscoverer {
  constructor(
    private http: PageSource,
    private logger: Logger = console
  ) {}

  async discover(baseUrl: string): Promise<PdfReference[]> {
    let html: string;
    try {
      html = await this.http.html(baseUrl);
    } catch (err) {
      throw new FetchError(baseUrl, `Could not fetch ${baseUrl}: ${describeError(err)}`, { cause: err });
    }

    const pdfs = extractPdfLinks(html, baseUrl);
    this.logger.log(`[discover] ${baseUrl}: ${pdfs.length} pdf links`);
    return pdfs;
  }
}

export function extractPdfLinks(html: string, baseUrl: string): PdfReference[] {
  const $ = cheerio.load(html);
  const pdfs: PdfReference[] = [];
  $('a[href$=".pdf"]').each((_, a) => {
    const abs = ensureAbsoluteUrl(baseUrl, $(a).attr('href'));
    if (abs) pdfs.push(abs);
  });
  return pdfs;
}
