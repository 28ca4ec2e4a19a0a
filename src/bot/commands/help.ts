import type { Bot } from 'grammy';
import { contextTag } from '../context.js';
import type { LecternBotContext } from '../types.js';

export const HELP_TEXT = [
  'Send a PDF, DOCX, TXT or MD file and I will analyse it section by section.',
  'Add a caption like "type=essay" or "exclude=difficulty" to steer the analysis.',
  '',
  'Available commands:',
  '/analyze [type=<document type>] - analyse the last document again',
  '/status - show the current document, progress and last report',
  '/cancel - stop the running analysis or tool',
  '/retry [section ...] - re-run failed sections, or the named ones',
  '/tools - list research and study tools',
  '/tool <name> [key=value ...] - run one tool on the current document',
  '/help - show this message',
].join('\n');

export function registerHelpCommand(bot: Bot<LecternBotContext>): void {
  bot.command(['help', 'start'], async (ctx) => {
    console.log(`[help] /help received ${contextTag(ctx)}`);
    await ctx.reply(HELP_TEXT);
  });
}
