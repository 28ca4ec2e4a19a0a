import { conversations, createConversation } from '@grammyjs/conversations';
import { Bot } from 'grammy';
import { registerAnalyzeCommands } from './commands/analyze.js';
import { registerHelpCommand } from './commands/help.js';
import { createToolConversation, registerToolCommands, TOOL_CONVERSATION } from './commands/tools.js';
import { contextTag } from './context.js';
import type { BotDependencies, LecternBotContext } from './types.js';

function formatIncomingText(ctx: LecternBotContext): string | null {
  const text = ctx.message?.text ?? ctx.message?.caption ?? ctx.channelPost?.text;
  if (!text) return null;

  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= 120) return normalized;
  return `${normalized.slice(0, 117)}...`;
}

export function createBot(token: string, deps: BotDependencies): Bot<LecternBotContext> {
  const bot = new Bot<LecternBotContext>(token);

  bot.use(async (ctx, next) => {
    const incomingText = formatIncomingText(ctx);
    if (incomingText) {
      console.log(`[bot] incoming ${contextTag(ctx)} text="${incomingText}"`);
    } else {
      console.log(`[bot] incoming ${contextTag(ctx)} update=${Object.keys(ctx.update).join(',')}`);
    }
    await next();
  });

  bot.use(conversations());
  bot.use(createConversation(createToolConversation(deps), TOOL_CONVERSATION));

  registerHelpCommand(bot);
  registerAnalyzeCommands(bot, deps);
  registerToolCommands(bot, deps);

  bot.on('message:text', async (ctx) => {
    if (ctx.message.text.startsWith('/')) {
      await ctx.reply('Unknown command. Use /help to see what I can do.');
      return;
    }
    await ctx.reply('Send me a document to analyse, or use /help.');
  });

  bot.catch((err) => {
    console.error('Telegram bot error:', err.error);
  });

  return bot;
}
