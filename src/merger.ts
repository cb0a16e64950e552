import { PDFDocument } from 'pdf-lib';
import type { DocumentStore } from './storage.js';
import { MergeError, describeError } from './errors.js';
import type { LocalDocument, Logger, MergedDocument } from './types.js';

export const DEFAULT_MERGED_NAME = 'merged.pdf';

/**
 * Concatenates local PDFs into one file in the store. Inputs that cannot be
 * read are skipped; the merge fails only when nothing usable is left.
 */
export class DocumentMerger {
  constructor(
    private store: DocumentStore,
    private logger: Logger = console
  ) {}

  async merge(docs: LocalDocument[], outputName = DEFAULT_MERGED_NAME): Promise<MergedDocument> {
    if (docs.length === 0) {
      throw new MergeError('No documents to merge');
    }

    const target = await PDFDocument.create();
    const sources: string[] = [];

    for (const doc of docs) {
      try {
        const bytes = await this.store.read(doc.name);
        const source = await PDFDocument.load(bytes);
        const pages = await target.copyPages(source, source.getPageIndices());
        pages.forEach((page) => target.addPage(page));
        sources.push(doc.name);
      } catch (err) {
        const failure = new MergeError(`Error merging ${doc.name}: ${describeError(err)}`, doc.name, { cause: err });
        this.logger.warn(`[merge] skip: ${failure.message}`);
      }
    }

    const pageCount = target.getPageCount();
    if (sources.length === 0 || pageCount === 0) {
      throw new MergeError(`None of the ${docs.length} documents could be merged`);
    }

    const outPath = await this.store.write(outputName, await target.save());
    this.logger.log(`[merge] saved ${outputName}: ${pageCount} pages from ${sources.length}/${docs.length} documents`);

    await this.removeInputs(docs, outputName);
    return { name: outputName, path: outPath, pageCount, sources };
  }

  private async removeInputs(docs: LocalDocument[], outputName: string) {
    const names = new Set(docs.map((d) => d.name));
    names.delete(outputName);
    for (const name of names) {
      try {
        await this.store.remove(name);
      } catch (err) {
        this.logger.warn(`[merge] could not delete ${name}: ${describeError(err)}`);
      }
    }
  }
}
