#!/usr/bin/env node
import 'dotenv/config';
import { Client, GatewayIntentBits, ChatInputCommandInteraction, Partials } from 'discord.js';
import { loadConfig } from '../config.js';
import { createSession } from '../pipeline.js';
import { describeOutcome } from '../session.js';
import { truncate } from '../utils.js';

const DISCORD_MESSAGE_LIMIT = 2000;

const cfg = loadConfig();
const token = cfg.discord.token;
if (!token) {
  console.error('Missing DISCORD_TOKEN');
  process.exit(1);
}

// One session for the whole bot: every channel shares the loaded documents
const session = createSession(cfg, {
  onStateChange: (state) => console.log(`[bot] session ${state}`)
});

const client = new Client({
  intents: [GatewayIntentBits.Guilds],
  partials: [Partials.Channel]
});

client.once('ready', () => {
  console.log(`[bot] logged in as ${client.user?.tag}`);
});

client.on('interactionCreate', async (interaction) => {
  if (!interaction.isChatInputCommand()) return;
  try {
    switch (interaction.commandName) {
      case 'ingest':
        await handleIngest(interaction);
        break;
      case 'ask':
        await handleAsk(interaction);
        break;
      case 'status':
        await handleStatus(interaction);
        break;
    }
  } catch (e) {
    console.error('[bot] handler error', e);
    const content = 'Sorry, something went wrong.';
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply({ content });
      } else {
        await interaction.reply({ content, ephemeral: true });
      }
    } catch (err) {
      console.error('[bot] could not report error', err);
    }
  }
});

async function handleIngest(interaction: ChatInputCommandInteraction) {
  const url = interaction.options.getString('url') ?? cfg.baseUrl;
  if (!url) {
    await interaction.reply({ content: 'Give a page URL or set BASE_URL.', ephemeral: true });
    return;
  }
  await interaction.deferReply();
  const outcome = await session.runIngestion(url);
  await interaction.editReply({ content: truncate(describeOutcome(outcome), DISCORD_MESSAGE_LIMIT) });
}

async function handleAsk(interaction: ChatInputCommandInteraction) {
  const question = interaction.options.getString('question', true);
  await interaction.deferReply();
  const answer = await session.ask(question);
  await interaction.editReply({ content: truncate(answer, DISCORD_MESSAGE_LIMIT) });
}

async function handleStatus(interaction: ChatInputCommandInteraction) {
  const text = session.ready ? 'Documents loaded. Ask away with /ask.' : `Session is ${session.state}.`;
  await interaction.reply({ content: text, ephemeral: true });
}

client.login(token).catch((e) => {
  console.error('[bot] login failed', e);
  process.exit(1);
});
