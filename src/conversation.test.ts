import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { ConsoleSpeaker, ReadlineListener, runConversation, type Listener, type Speaker } from './conversation.js';

function scriptedListener(lines: (string | null)[], controller: AbortController): Listener {
  const queue = [...lines];
  return {
    listen: async () => {
      if (queue.length === 0) {
        controller.abort();
        return null;
      }
      return queue.shift() ?? null;
    }
  };
}

function recordingSpeaker(): Speaker & { said: string[] } {
  const said: string[] = [];
  return {
    said,
    say: async (text: string) => {
      said.push(text);
    }
  };
}

function buffered(stream: PassThrough): string {
  const chunk: unknown = stream.read();
  return Buffer.isBuffer(chunk) ? chunk.toString('utf-8') : '';
}

describe('runConversation', () => {
  it('asks every heard question and speaks the answers until stopped', async () => {
    const controller = new AbortController();
    const speaker = recordingSpeaker();
    const session = { ask: vi.fn(async (q: string) => `answer to ${q}`) };

    const answered = await runConversation(
      session,
      { listener: scriptedListener(['first?', null, '   ', ' second? '], controller), speaker },
      controller.signal
    );

    expect(answered).toBe(2);
    expect(session.ask.mock.calls).toEqual([['first?'], ['second?']]);
    expect(speaker.said).toEqual(['answer to first?', 'answer to second?']);
  });

  it('does nothing when already stopped', async () => {
    const controller = new AbortController();
    controller.abort();
    const session = { ask: vi.fn(async () => 'unused') };

    expect(await runConversation(session, { listener: scriptedListener(['q'], controller), speaker: recordingSpeaker() }, controller.signal)).toBe(0);
    expect(session.ask).not.toHaveBeenCalled();
  });

  it('finishes the turn in flight before honouring a stop', async () => {
    const controller = new AbortController();
    const speaker = recordingSpeaker();
    const session = {
      ask: vi.fn(async (q: string) => {
        controller.abort();
        return `late answer to ${q}`;
      })
    };

    const answered = await runConversation(
      session,
      { listener: scriptedListener(['one', 'two'], controller), speaker },
      controller.signal
    );

    expect(answered).toBe(1);
    expect(speaker.said).toEqual(['late answer to one']);
  });

  it('ends quietly when listening is interrupted by the stop', async () => {
    const controller = new AbortController();
    const listener: Listener = {
      listen: async () => {
        controller.abort();
        throw new Error('The operation was aborted');
      }
    };

    expect(await runConversation({ ask: vi.fn() }, { listener, speaker: recordingSpeaker() }, controller.signal)).toBe(0);
  });

  it('propagates listener failures that are not a stop', async () => {
    const controller = new AbortController();
    const listener: Listener = {
      listen: async () => {
        throw new Error('microphone unplugged');
      }
    };

    await expect(
      runConversation({ ask: vi.fn() }, { listener, speaker: recordingSpeaker() }, controller.signal)
    ).rejects.toThrow('microphone unplugged');
  });
});

describe('console I/O', () => {
  it('reads one trimmed line per question', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const listener = new ReadlineListener(input, output, '> ');

    const heard = listener.listen(new AbortController().signal);
    input.write('  when is the meeting?  \n');

    expect(await heard).toBe('when is the meeting?');
    expect(buffered(output)).toBe('> ');
    listener.close();
  });

  it('treats a blank line as nothing heard', async () => {
    const input = new PassThrough();
    const listener = new ReadlineListener(input, new PassThrough());

    const heard = listener.listen(new AbortController().signal);
    input.write('\n');

    expect(await heard).toBeNull();
    listener.close();
  });

  it('prints answers with a label', async () => {
    const output = new PassThrough();

    await new ConsoleSpeaker(output).say('At 3pm.');

    expect(buffered(output)).toBe('Assistant: At 3pm.\n\n');
  });
});
