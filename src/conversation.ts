import * as readline from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import type { IngestionSession } from './session.js';

export interface Listener {
  /** Next question, or null when nothing usable was heard. */
  listen(signal: AbortSignal): Promise<string | null>;
}

export interface Speaker {
  say(text: string): Promise<void>;
}

export type ConversationIO = {
  listener: Listener;
  speaker: Speaker;
};

/**
 * Listen, ask, speak until `signal` aborts. The signal is checked between
 * turns; a question already sent to the model finishes first.
 * Resolves with the number of answered questions.
 */
export async function runConversation(
  session: Pick<IngestionSession, 'ask'>,
  io: ConversationIO,
  signal: AbortSignal
): Promise<number> {
  let answered = 0;
  while (!signal.aborted) {
    let question: string | null;
    try {
      question = await io.listener.listen(signal);
    } catch (err) {
      if (signal.aborted) break;
      throw err;
    }
    if (signal.aborted) break;
    const q = question?.trim();
    if (!q) continue;

    const answer = await session.ask(q);
    await io.speaker.say(answer);
    answered++;
  }
  return answered;
}

export class ReadlineListener implements Listener {
  private rl: readline.Interface;

  constructor(
    input: Readable = process.stdin,
    output: Writable = process.stdout,
    private prompt = 'You: '
  ) {
    this.rl = readline.createInterface({ input, output });
  }

  onClose(fn: () => void) {
    this.rl.on('close', fn);
  }

  async listen(signal: AbortSignal): Promise<string | null> {
    const line = await this.rl.question(this.prompt, { signal });
    return line.trim() || null;
  }

  close() {
    this.rl.close();
  }
}

export class ConsoleSpeaker implements Speaker {
  constructor(
    private output: Writable = process.stdout,
    private label = 'Assistant'
  ) {}

  async say(text: string): Promise<void> {
    this.output.write(`${this.label}: ${text}\n\n`);
  }
}
