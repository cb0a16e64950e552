import { HttpClient } from './http.js';
import { DocumentStore } from './storage.js';
import { LinkDiscoverer } from './crawler.js';
import { DocumentFetcher } from './fetcher.js';
import { DocumentMerger } from './merger.js';
import { TextExtractor } from './extractor.js';
import { OpenAIModel, QuestionAnswerer, type LanguageModel } from './answerer.js';
import { IngestionSession, type SessionOptions } from './session.js';
import type { AppConfig } from './config.js';
import type { Logger } from './types.js';

export type PipelineOverrides = {
  http?: HttpClient;
  llm?: LanguageModel;
  logger?: Logger;
  onStateChange?: SessionOptions['onStateChange'];
};

/** Wires a session from configuration; every collaborator is built here and nowhere else. */
export function createSession(cfg: AppConfig, overrides: PipelineOverrides = {}): IngestionSession {
  const logger = overrides.logger ?? console;
  const http =
    overrides.http ??
    new HttpClient({
      userAgent: cfg.http.userAgent,
      timeoutMs: cfg.http.timeoutMs,
      delayMs: cfg.http.delayMs,
      concurrency: cfg.downloadConcurrency
    });
  const store = new DocumentStore(cfg.pdfDir);
  const llm =
    overrides.llm ??
    new OpenAIModel({
      apiKey: cfg.llm.apiKey,
      model: cfg.llm.model,
      baseURL: cfg.llm.baseURL,
      timeoutMs: cfg.llm.timeoutMs
    });

  return new IngestionSession(
    {
      discoverer: new LinkDiscoverer(http, logger),
      fetcher: new DocumentFetcher(http, store, { concurrency: cfg.downloadConcurrency, logger }),
      merger: new DocumentMerger(store, logger),
      extractor: new TextExtractor(store, logger),
      answerer: new QuestionAnswerer(llm)
    },
    { mergedName: cfg.mergedName, logger, onStateChange: overrides.onStateChange }
  );
}
