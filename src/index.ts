#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from './config.js';
import { createSession } from './pipeline.js';
import { describeOutcome } from './session.js';
import { ConsoleSpeaker, ReadlineListener, runConversation } from './conversation.js';

type Command = 'ingest' | 'ask' | 'chat' | 'help';

const COMMANDS: readonly Command[] = ['ingest', 'ask', 'chat', 'help'];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function main() {
  const [arg, ...rest] = process.argv.slice(2);
  const cmd: Command = isCommand(arg) ? arg : 'help';
  const cfg = loadConfig();
  switch (cmd) {
    case 'ingest':
      process.exitCode = await runIngest(cfg, rest[0]);
      break;
    case 'ask':
      process.exitCode = await runAsk(cfg, rest);
      break;
    case 'chat':
      process.exitCode = await runChat(cfg, rest[0]);
      break;
    case 'help':
    default:
      printHelp();
  }
}

function resolveUrl(cfg: AppConfig, arg: string | undefined): string | null {
  const url = arg || cfg.baseUrl;
  if (!url) {
    console.error('Missing page URL. Pass it as an argument or set BASE_URL.');
    return null;
  }
  return url;
}

async function runIngest(cfg: AppConfig, urlArg?: string): Promise<number> {
  const url = resolveUrl(cfg, urlArg);
  if (!url) return 1;
  const session = createSession(cfg);
  const outcome = await session.runIngestion(url);
  console.log(describeOutcome(outcome));
  return outcome.ok ? 0 : 1;
}

// ask <url> <question...>: the context lives in memory, so each call ingests first
async function runAsk(cfg: AppConfig, args: string[]): Promise<number> {
  const [urlArg, ...words] = args;
  const question = words.join(' ').trim();
  const url = resolveUrl(cfg, urlArg);
  if (!url || !question) {
    console.error('Usage: pdf-qa ask <page-url> <question>');
    return 1;
  }
  const session = createSession(cfg);
  const outcome = await session.runIngestion(url);
  console.log(describeOutcome(outcome));
  if (!outcome.ok) return 1;
  console.log(await session.ask(question));
  return 0;
}

async function runChat(cfg: AppConfig, urlArg?: string): Promise<number> {
  const url = resolveUrl(cfg, urlArg);
  if (!url) return 1;

  const controller = new AbortController();
  const listener = new ReadlineListener();
  const speaker = new ConsoleSpeaker();
  listener.onClose(() => controller.abort());

  const session = createSession(cfg);
  console.log(`[chat] loading PDFs from ${url} ...`);
  await speaker.say(describeOutcome(await session.runIngestion(url)));

  console.log('Ask about the documents. Commands: /reload, /quit\n');
  const io = {
    speaker,
    listener: {
      listen: async (signal: AbortSignal) => {
        const line = await listener.listen(signal);
        if (line === '/quit') {
          controller.abort();
          return null;
        }
        if (line === '/reload') {
          await speaker.say(describeOutcome(await session.runIngestion(url)));
          return null;
        }
        return line;
      }
    }
  };

  try {
    const answered = await runConversation(session, io, controller.signal);
    console.log(`[chat] answered ${answered} questions. Goodbye!`);
  } finally {
    listener.close();
  }
  return 0;
}

function printHelp() {
  console.log('Usage:');
  console.log('  pdf-qa ingest [url]           # Download, merge and extract the PDFs linked from a page');
  console.log('  pdf-qa ask <url> <question>   # Ingest, then answer one question');
  console.log('  pdf-qa chat [url]             # Ingest, then answer questions until /quit');
  console.log('Env:');
  console.log('  BASE_URL=https://example.com/documents/ PDF_DIR=pdfs MERGED_NAME=merged.pdf');
  console.log('  OPENAI_API_KEY=... LLM_MODEL=gpt-4.1-mini LLM_BASE_URL=...');
  console.log('  HTTP_TIMEOUT_MS=30000 DL_CONCURRENCY=1 DELAY_MS=0 USER_AGENT=...');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
