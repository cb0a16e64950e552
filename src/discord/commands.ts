import { SlashCommandBuilder } from 'discord.js';

export const ingestCmd = new SlashCommandBuilder()
  .setName('ingest')
  .setDescription('Download and merge the PDFs linked from a page, then load their text')
  .addStringOption((opt) => opt.setName('url').setDescription('Page to scan for PDF links (defaults to BASE_URL)'));

export const askCmd = new SlashCommandBuilder()
  .setName('ask')
  .setDescription('Ask a question about the loaded documents')
  .addStringOption((opt) => opt.setName('question').setDescription('Your question').setRequired(true));

export const statusCmd = new SlashCommandBuilder()
  .setName('status')
  .setDescription('Show whether documents are loaded');

export const commands = [ingestCmd, askCmd, statusCmd];
export const commandsJson = commands.map((c) => c.toJSON());
