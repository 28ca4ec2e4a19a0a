import type { LecternBotContext } from './types.js';

export function contextTag(ctx: LecternBotContext): string {
  const chatId = ctx.chat?.id ?? 'unknown';
  const userId = ctx.from?.id ?? 'unknown';
  return `chat=${chatId} user=${userId}`;
}

/** Text after the command itself, e.g. `/tool@lectern_bot flashcards` gives `flashcards`. */
export function commandArguments(text: string | undefined): string[] {
  return (text ?? '')
    .replace(/^\/\w+(@\w+)?/, '')
    .trim()
    .split(/\s+/)
    .filter(Boolean);
}
