import type { Bot } from 'grammy';
import { parseToolParameters, TOOLS } from '../../analysis/tools.js';
import { isAnalysisError, toErrorMessage } from '../../errors.js';
import type { ToolParameters } from '../../types.js';
import { commandArguments, contextTag } from '../context.js';
import { startToolJob } from '../jobs.js';
import type { BotDependencies, LecternBotContext, LecternConversation } from '../types.js';

export const TOOL_CONVERSATION = 'toolConversation';

function formatToolList(): string {
  const lines = ['Available tools:'];
  for (const descriptor of TOOLS) {
    lines.push(`- ${descriptor.name}: ${descriptor.description}`);
  }
  lines.push('');
  lines.push('Run one with /tool <name> [key=value ...], e.g. /tool flashcards count=10');
  return lines.join('\n');
}

function launchTool(
  deps: BotDependencies,
  ctx: LecternBotContext,
  chatId: number,
  toolName: string,
  parameters: ToolParameters,
): string {
  try {
    const descriptor = deps.runtime.tools.resolve(toolName);
    if (!startToolJob(deps, ctx.api, chatId, descriptor.name, parameters)) {
      return 'Something is already running. Use /cancel to stop it first.';
    }
    return `Running ${descriptor.title}...`;
  } catch (error) {
    if (isAnalysisError(error)) return error.message;
    throw error;
  }
}

export function createToolConversation(deps: BotDependencies) {
  return async function toolConversation(conversation: LecternConversation, ctx: LecternBotContext): Promise<void> {
    console.log(`[tools] tool picker started ${contextTag(ctx)}`);
    await ctx.reply(
      [formatToolList(), '', 'Reply with a tool name (and optional key=value parameters), or /cancel.'].join('\n'),
    );

    const nextCtx = await conversation.waitFor(':text', {
      otherwise: async (invalidCtx) => {
        await invalidCtx.reply('Please reply with a tool name.');
      },
    });

    const answer = nextCtx.msg.text.trim();
    if (/^\/cancel\b/i.test(answer)) {
      console.log(`[tools] tool picker cancelled ${contextTag(nextCtx)}`);
      await nextCtx.reply('No tool was run.');
      return;
    }

    const [toolName, ...tokens] = answer.split(/\s+/);
    const chatId = nextCtx.chat?.id;
    if (!toolName || chatId === undefined) return;

    let parameters: ToolParameters;
    try {
      parameters = parseToolParameters(tokens);
    } catch (error) {
      await nextCtx.reply(toErrorMessage(error));
      return;
    }

    const reply = await conversation.external((outsideCtx) =>
      launchTool(deps, outsideCtx, chatId, toolName, parameters),
    );
    await nextCtx.reply(reply);
  };
}

export function registerToolCommands(bot: Bot<LecternBotContext>, deps: BotDependencies): void {
  bot.command('tools', async (ctx) => {
    console.log(`[tools] /tools received ${contextTag(ctx)}`);
    await ctx.reply(formatToolList());
  });

  bot.command('tool', async (ctx) => {
    const chatId = ctx.chat.id;
    const [toolName, ...tokens] = commandArguments(ctx.message?.text);
    console.log(`[tools] /tool received ${contextTag(ctx)} tool=${toolName ?? '(picker)'}`);

    if (!deps.sessions.get(chatId).document) {
      await ctx.reply('Send me a document first, then pick a tool.');
      return;
    }

    if (!toolName) {
      await ctx.conversation.enter(TOOL_CONVERSATION);
      return;
    }

    let parameters: ToolParameters;
    try {
      parameters = parseToolParameters(tokens);
    } catch (error) {
      await ctx.reply(toErrorMessage(error));
      return;
    }

    await ctx.reply(launchTool(deps, ctx, chatId, toolName, parameters));
  });
}
