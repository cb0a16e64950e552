import pLimit from 'p-limit';
import type { HttpClient } from './http.js';
import type { DocumentStore } from './storage.js';
import { DownloadError, describeError } from './errors.js';
import { filenameFromUrl } from './utils.js';
import type { LocalDocument, Logger, PdfReference } from './types.js';

export type Downloader = Pick<HttpClient, 'download'>;

export type FetcherOptions = {
  concurrency?: number; // parallel downloads, 1 = one after another
  logger?: Logger;
  onError?: (err: DownloadError) => void;
};

/**
 * Downloads documents into the store, keyed by filename. A file already in the
 * store is never downloaded again, whatever its URL or remote content.
 */
export class DocumentFetcher {
  private concurrency: number;
  private logger: Logger;
  private onError?: (err: DownloadError) => void;
  private inflight = new Map<string, Promise<LocalDocument | null>>();

  constructor(
    private http: Downloader,
    private store: DocumentStore,
    opts: FetcherOptions = {}
  ) {
    this.concurrency = Math.max(1, opts.concurrency ?? 1);
    this.logger = opts.logger ?? console;
    this.onError = opts.onError;
  }

  async fetch(refs: PdfReference[]): Promise<LocalDocument[]> {
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(refs.map((url) => limit(() => this.fetchOne(url))));

    const seen = new Set<string>();
    const docs: LocalDocument[] = [];
    for (const doc of results) {
      if (!doc || seen.has(doc.name)) continue;
      seen.add(doc.name);
      docs.push(doc);
    }
    this.logger.log(`[fetch] completed: ${docs.length}/${refs.length}`);
    return docs;
  }

  // Same filename never downloads twice at once: later callers share the first attempt
  private fetchOne(url: PdfReference): Promise<LocalDocument | null> {
    const name = filenameFromUrl(url);
    const pending = this.inflight.get(name);
    if (pending) return pending;

    const task = this.load(url, name).finally(() => this.inflight.delete(name));
    this.inflight.set(name, task);
    return task;
  }

  private async load(url: PdfReference, name: string): Promise<LocalDocument | null> {
    if (this.store.has(name)) {
      this.logger.log(`[fetch] skip (present): ${name}`);
      return { name, path: this.store.pathOf(name), url, downloaded: false };
    }

    let tmp: string | undefined;
    try {
      tmp = this.store.downloadTarget(name);
      await this.http.download(url, tmp);
      const outPath = await this.store.commit(tmp, name);
      this.logger.log(`[fetch] ok: ${name}`);
      return { name, path: outPath, url, downloaded: true };
    } catch (err) {
      if (tmp) await this.store.discard(tmp);
      const failure = new DownloadError(url, `Failed to download ${url}: ${describeError(err)}`, { cause: err });
      this.logger.warn(`[fetch] fail: ${failure.message}`);
      this.onError?.(failure);
      return null;
    }
  }
}
