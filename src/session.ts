import pLimit from 'p-limit';
import type { LinkDiscoverer } from './crawler.js';
import type { DocumentFetcher } from './fetcher.js';
import { DEFAULT_MERGED_NAME, type DocumentMerger } from './merger.js';
import type { TextExtractor } from './extractor.js';
import type { QuestionAnswerer } from './answerer.js';
import { describeError } from './errors.js';
import { filenameFromUrl } from './utils.js';
import type { IngestionOutcome, IngestionStage, Logger, PdfReference, SessionState } from './types.js';

export const NOT_READY_MESSAGE = 'Not ready: load a page of PDF documents before asking questions.';

export type SessionParts = {
  discoverer: Pick<LinkDiscoverer, 'discover'>;
  fetcher: Pick<DocumentFetcher, 'fetch'>;
  merger: Pick<DocumentMerger, 'merge'>;
  extractor: Pick<TextExtractor, 'extract'>;
  answerer: Pick<QuestionAnswerer, 'answer'>;
};

export type SessionOptions = {
  mergedName?: string;
  logger?: Logger;
  onStateChange?: (state: SessionState) => void;
};

/**
 * Holds the one active document context. States: empty -> ingesting -> ready,
 * and back to empty whenever a run fails. Runs are serialised; questions are
 * answered only in `ready`, each against the context current when it was asked.
 */
export class IngestionSession {
  private current: SessionState = 'empty';
  private context: string | null = null;
  private lock = pLimit(1);
  private mergedName: string;
  private logger: Logger;
  private onStateChange?: (state: SessionState) => void;

  constructor(
    private parts: SessionParts,
    opts: SessionOptions = {}
  ) {
    this.mergedName = opts.mergedName ?? DEFAULT_MERGED_NAME;
    this.logger = opts.logger ?? console;
    this.onStateChange = opts.onStateChange;
  }

  get state(): SessionState {
    return this.current;
  }

  get ready(): boolean {
    return this.current === 'ready';
  }

  runIngestion(baseUrl: string): Promise<IngestionOutcome> {
    return this.lock(() => this.ingest(baseUrl));
  }

  async ask(question: string): Promise<string> {
    const context = this.context;
    if (this.current !== 'ready' || context === null) return NOT_READY_MESSAGE;
    return this.parts.answerer.answer(context, question);
  }

  private async ingest(baseUrl: string): Promise<IngestionOutcome> {
    this.setState('ingesting');
    this.logger.log(`[ingest] start ${baseUrl} at ${new Date().toISOString()}`);

    let stage: IngestionStage = 'discover';
    try {
      const refs = this.withoutMergeOutput(await this.parts.discoverer.discover(baseUrl));
      if (refs.length === 0) {
        return this.fail(stage, `No PDF links found on ${baseUrl}`);
      }

      stage = 'fetch';
      const docs = await this.parts.fetcher.fetch(refs);
      if (docs.length === 0) {
        return this.fail(stage, `None of the ${refs.length} PDF documents could be downloaded`);
      }

      stage = 'merge';
      const merged = await this.parts.merger.merge(docs, this.mergedName);

      stage = 'extract';
      const text = await this.parts.extractor.extract(merged);
      if (!text) {
        return this.fail(stage, `No text could be extracted from ${merged.name}`);
      }

      this.context = text;
      this.setState('ready');
      this.logger.log(`[ingest] ready: ${merged.pageCount} pages, ${text.length} characters`);
      return { ok: true, pdfCount: refs.length, documentCount: docs.length, merged, characters: text.length };
    } catch (err) {
      return this.fail(stage, describeError(err));
    }
  }

  // A link named like the merge output would pick up the previous run's result from the store.
  private withoutMergeOutput(refs: PdfReference[]): PdfReference[] {
    return refs.filter((ref) => {
      if (filenameFromUrl(ref) !== this.mergedName) return true;
      this.logger.warn(`[ingest] ignoring ${ref}: same name as the merge output`);
      return false;
    });
  }

  private fail(stage: IngestionStage, message: string): IngestionOutcome {
    this.context = null;
    this.setState('empty');
    this.logger.warn(`[ingest] failed at ${stage}: ${message}`);
    return { ok: false, stage, message };
  }

  private setState(next: SessionState) {
    if (this.current === next) return;
    this.current = next;
    this.onStateChange?.(next);
  }
}

export function describeOutcome(outcome: IngestionOutcome): string {
  if (!outcome.ok) return `Ingestion failed (${outcome.stage}): ${outcome.message}`;
  const { merged } = outcome;
  return (
    `Merged ${merged.sources.length} of ${outcome.pdfCount} linked PDFs ` +
    `(${merged.pageCount} pages, ${outcome.characters} characters). ` +
    'You can now ask questions about the content.'
  );
}
