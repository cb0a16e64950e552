export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  delayMs?: number;
  concurrency?: number;
};

export type PdfReference = string; // absolute URL

export type LocalDocument = {
  name: string; // filename inside the store
  path: string; // absolute path
  url: PdfReference;
  downloaded: boolean; // false when the file was already in the store
};

export type MergedDocument = {
  name: string;
  path: string;
  pageCount: number;
  sources: string[]; // names of the inputs whose pages made it in
};

export type SessionState = 'empty' | 'ingesting' | 'ready';

export type IngestionStage = 'discover' | 'fetch' | 'merge' | 'extract';

export type IngestionOutcome =
  | {
      ok: true;
      pdfCount: number; // links discovered
      documentCount: number; // documents available after fetch
      merged: MergedDocument;
      characters: number;
    }
  | {
      ok: false;
      stage: IngestionStage;
      message: string;
    };
