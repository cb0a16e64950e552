import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import { vi, type Mock } from 'vitest';

export type QuietLogger = { log: Mock; warn: Mock; error: Mock };

export function quietLogger(): QuietLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function tempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'pdf-qa-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** One page per entry; each page is `width` wide so page order can be checked without text. */
export async function textPdf(pages: string[], width = 300): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  pages.forEach((text, i) => {
    const page = doc.addPage([width + i * 10, 200]);
    page.drawText(text, { x: 20, y: 100, size: 14, font });
  });
  return doc.save();
}

export async function imageOnlyPdf(): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const page = doc.addPage([300, 200]);
  page.drawRectangle({ x: 20, y: 20, width: 100, height: 80, color: rgb(0.2, 0.4, 0.8) });
  return doc.save();
}

export const NOT_A_PDF = new TextEncoder().encode('this is not a pdf');
