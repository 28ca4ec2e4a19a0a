import type { Conversation, ConversationFlavor } from '@grammyjs/conversations';
import type { Context } from 'grammy';
import type { LecternConfig } from '../config.js';
import type { ReportArchive } from '../report/archive.js';
import type { Runtime } from '../runtime.js';
import type { ChatSessionStore } from './session.js';

export type LecternBotContext = ConversationFlavor<Context>;
export type LecternConversation = Conversation<LecternBotContext, LecternBotContext>;

export interface BotDependencies {
  config: LecternConfig;
  runtime: Runtime;
  sessions: ChatSessionStore;
  archive: ReportArchive | null;
}
