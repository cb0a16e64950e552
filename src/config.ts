import path from 'node:path';
import { parseIntOr } from './utils.js';

export type AppConfig = {
  baseUrl?: string;
  pdfDir: string;
  mergedName: string;
  http: {
    userAgent: string;
    timeoutMs: number;
    delayMs: number;
  };
  downloadConcurrency: number;
  llm: {
    apiKey?: string;
    model: string;
    baseURL?: string;
    timeoutMs: number;
  };
  discord: {
    token?: string;
    appId?: string;
    guildId?: string;
  };
};

export const DEFAULT_USER_AGENT = 'pdf-question-assistant/0.1';
export const DEFAULT_MODEL = 'gpt-4.1-mini';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    baseUrl: nonEmpty(env.BASE_URL),
    pdfDir: path.resolve(env.PDF_DIR || env.FILES_ROOT || 'pdfs'),
    mergedName: env.MERGED_NAME || 'merged.pdf',
    http: {
      userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
      timeoutMs: Math.max(1, parseIntOr(env.HTTP_TIMEOUT_MS, 30000)),
      delayMs: Math.max(0, parseIntOr(env.DELAY_MS, 0))
    },
    downloadConcurrency: Math.max(1, parseIntOr(env.DL_CONCURRENCY, 1)),
    llm: {
      // API is the variable name older .env files used
      apiKey: nonEmpty(env.OPENAI_API_KEY) ?? nonEmpty(env.API),
      model: env.LLM_MODEL || DEFAULT_MODEL,
      baseURL: nonEmpty(env.LLM_BASE_URL),
      timeoutMs: Math.max(1, parseIntOr(env.LLM_TIMEOUT_MS, 60000))
    },
    discord: {
      token: nonEmpty(env.DISCORD_TOKEN) ?? nonEmpty(env.BOT_TOKEN),
      appId: nonEmpty(env.DISCORD_APP_ID) ?? nonEmpty(env.APP_ID),
      guildId: nonEmpty(env.DISCORD_GUILD_ID) ?? nonEmpty(env.GUILD_ID)
    }
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}
