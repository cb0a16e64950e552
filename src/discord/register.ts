#!/usr/bin/env node
import 'dotenv/config';
import { REST, Routes } from 'discord.js';
import { commandsJson } from './commands.js';
import { loadConfig } from '../config.js';

const { token, appId, guildId } = loadConfig().discord;

async function main() {
  if (!token || !appId) {
    console.error('Missing DISCORD_TOKEN or DISCORD_APP_ID');
    process.exit(1);
  }

  const rest = new REST({ version: '10' }).setToken(token);
  if (guildId) {
    const data = await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: commandsJson });
    console.log(`[register] registered ${countOf(data)} guild commands to ${guildId}`);
  } else {
    const data = await rest.put(Routes.applicationCommands(appId), { body: commandsJson });
    console.log(`[register] registered ${countOf(data)} global commands (may take up to 1 hour to propagate)`);
  }
}

function countOf(data: unknown): number {
  return Array.isArray(data) ? data.length : 0;
}

main().catch((e) => {
  console.error('[register] failed', e);
  process.exit(1);
});
