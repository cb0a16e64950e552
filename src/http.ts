import got, { type Got, type Response } from 'got';
import pLimit from 'p-limit';
import fs from 'node:fs';
import path from 'node:path';
import { sleep } from './utils.js';
import type { HttpOptions } from './types.js';

export class HttpClient {
  private client: Got;
  private limit: ReturnType<typeof pLimit>;
  private delayMs: number;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, delayMs, concurrency } = opts;
    this.client = got.extend({
      headers: userAgent ? { 'user-agent': userAgent } : {},
      followRedirect: true,
      retry: { limit: 0 },
      timeout: { request: timeoutMs ?? 30000 }
    });
    this.limit = pLimit(Math.max(1, concurrency ?? 4));
    this.delayMs = Math.max(0, delayMs ?? 0);
  }

  async html(url: string): Promise<string> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs);
      const res: Response<string> = await this.client.get(url, { responseType: 'text' });
      return res.body;
    });
  }

  /** Streams `url` into `destination`; rejects on any non-2xx response or transport failure. */
  async download(url: string, destination: string): Promise<string> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs);
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      const stream = this.client.stream(url);
      const fileStream = fs.createWriteStream(destination);
      await new Promise<void>((resolve, reject) => {
        stream.on('error', (err) => {
          fileStream.destroy();
          reject(err);
        });
        fileStream.on('error', (err) => {
          stream.destroy();
          reject(err);
        });
        fileStream.on('finish', () => resolve());
        stream.pipe(fileStream);
      });
      return destination;
    });
  }
}
