export type PipelineErrorCode = 'FETCH' | 'DOWNLOAD' | 'MERGE' | 'EXTRACTION' | 'API';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/** The source page could not be fetched. Ends the ingestion run. */
export class FetchError extends PipelineError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super('FETCH', message, options);
    this.name = 'FetchError';
  }
}

/** One document could not be downloaded. The batch carries on without it. */
export class DownloadError extends PipelineError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super('DOWNLOAD', message, options);
    this.name = 'DownloadError';
  }
}

/**
 * Raised per input when a document cannot be merged (absorbed), and for the
 * whole merge when no input could be used (ends the run).
 */
export class MergeError extends PipelineError {
  constructor(message: string, readonly input?: string, options?: { cause?: unknown }) {
    super('MERGE', message, options);
    this.name = 'MergeError';
  }
}

export class ExtractionError extends PipelineError {
  constructor(readonly file: string, message: string, options?: { cause?: unknown }) {
    super('EXTRACTION', message, options);
    this.name = 'ExtractionError';
  }
}

/** Language model call failed. Turned into an answer string, never rethrown to callers. */
export class ApiError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('API', message, options);
    this.name = 'ApiError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return String(err);
}
