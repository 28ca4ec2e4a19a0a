import type { Bot } from 'grammy';
import { failedTasks } from '../../analysis/orchestrator.js';
import { documentTypeLabel, isDocumentType } from '../../analysis/registry.js';
import { parseToolParameters } from '../../analysis/tools.js';
import { extractText, isSupportedDocument, SUPPORTED_EXTENSIONS } from '../../documents/extract.js';
import { isAnalysisError, toErrorMessage } from '../../errors.js';
import { DOCUMENT_TYPES } from '../../types.js';
import { commandArguments, contextTag } from '../context.js';
import { startAnalysisJob, startRetryJob, type AnalysisJobInput } from '../jobs.js';
import type { BotDependencies, LecternBotContext } from '../types.js';

function formatElapsed(startedAt: string): string {
  const seconds = Math.max(0, Math.round((Date.now() - new Date(startedAt).getTime()) / 1000));
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

function parseAnalysisOptions(tokens: string[]): AnalysisJobInput {
  const input: AnalysisJobInput = {};
  for (const [key, value] of Object.entries(parseToolParameters(tokens))) {
    const text = String(value);
    if (key === 'type') {
      const normalized = text.toLowerCase().replace(/[\s-]+/g, '_');
      if (!isDocumentType(normalized)) {
        throw new Error(`Unknown document type "${text}". Use one of: ${DOCUMENT_TYPES.join(', ')}`);
      }
      input.documentType = normalized;
    } else if (key === 'exclude') {
      input.exclude = text.split(',').map((item) => item.trim()).filter(Boolean);
    } else {
      throw new Error(`Unknown option "${key}". Use type=<document type> or exclude=<sections>.`);
    }
  }
  return input;
}

async function downloadTelegramFile(ctx: LecternBotContext): Promise<Buffer> {
  const file = await ctx.getFile();
  if (!file.file_path) {
    throw new Error('Telegram did not return a download path for this file.');
  }
  const response = await fetch(`https://api.telegram.org/file/bot${ctx.api.token}/${file.file_path}`);
  if (!response.ok) {
    throw new Error(`File download failed with status ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

export function registerAnalyzeCommands(bot: Bot<LecternBotContext>, deps: BotDependencies): void {
  const maxUploadBytes = deps.config.maxUploadMb * 1024 * 1024;

  bot.on('message:document', async (ctx) => {
    const chatId = ctx.chat.id;
    const document = ctx.message.document;
    const fileName = document.file_name ?? 'document';
    console.log(`[analyze] document received ${contextTag(ctx)} name="${fileName}" size=${document.file_size ?? '?'}`);

    if (document.file_size !== undefined && document.file_size > maxUploadBytes) {
      await ctx.reply(`That file is larger than ${deps.config.maxUploadMb} MB. Please send a smaller document.`);
      return;
    }
    if (!isSupportedDocument(fileName)) {
      await ctx.reply(`I can read ${SUPPORTED_EXTENSIONS.join(', ')} files. "${fileName}" is not one of them.`);
      return;
    }
    if (deps.sessions.get(chatId).running) {
      await ctx.reply('An analysis is already running. Use /status to follow it or /cancel to stop it.');
      return;
    }

    let options: AnalysisJobInput;
    try {
      options = parseAnalysisOptions(commandArguments(`/caption ${ctx.message.caption ?? ''}`));
    } catch (error) {
      await ctx.reply(toErrorMessage(error));
      return;
    }

    let text: string;
    try {
      const data = await downloadTelegramFile(ctx);
      text = await extractText({ fileName, data, mimeType: document.mime_type });
    } catch (error) {
      console.error(`[analyze] could not read upload ${contextTag(ctx)}:`, error);
      const detail = isAnalysisError(error) ? error.message : 'The file could not be downloaded.';
      await ctx.reply(`I could not read that document. ${detail}`);
      return;
    }

    deps.sessions.setDocument(chatId, { fileName, text, receivedAt: new Date().toISOString() });
    const words = text.split(/\s+/).filter(Boolean).length;
    await ctx.reply(
      [
        `Received ${fileName} (${words} words). Analysis started.`,
        'Use /status to follow progress, /cancel to stop, or /tool to run a single tool instead.',
      ].join('\n'),
    );
    startAnalysisJob(deps, ctx.api, chatId, options);
  });

  bot.command('analyze', async (ctx) => {
    const chatId = ctx.chat.id;
    console.log(`[analyze] /analyze received ${contextTag(ctx)}`);
    const session = deps.sessions.get(chatId);

    if (!session.document) {
      await ctx.reply('Send me a PDF, DOCX, TXT or MD file first.');
      return;
    }
    if (session.running) {
      await ctx.reply('An analysis is already running. Use /cancel to stop it first.');
      return;
    }

    let options: AnalysisJobInput;
    try {
      options = parseAnalysisOptions(commandArguments(ctx.message?.text));
    } catch (error) {
      await ctx.reply(toErrorMessage(error));
      return;
    }

    startAnalysisJob(deps, ctx.api, chatId, options);
    const typeNote = options.documentType ? ` as ${documentTypeLabel(options.documentType)}` : '';
    await ctx.reply(`Analysing ${session.document.fileName}${typeNote}.`);
  });

  bot.command('cancel', async (ctx) => {
    console.log(`[analyze] /cancel received ${contextTag(ctx)}`);
    if (!deps.sessions.cancel(ctx.chat.id)) {
      await ctx.reply('Nothing is running.');
      return;
    }
    await ctx.reply('Cancelling. Sections already finished will be kept.');
  });

  bot.command('status', async (ctx) => {
    console.log(`[analyze] /status received ${contextTag(ctx)}`);
    const session = deps.sessions.get(ctx.chat.id);
    const lines: string[] = [];

    if (session.document) {
      lines.push(`Document: ${session.document.fileName}`);
    } else {
      lines.push('No document yet. Send a PDF, DOCX, TXT or MD file to start.');
    }

    if (session.running) {
      const progress = session.running.total > 0 ? ` (${session.running.completed}/${session.running.total} sections)` : '';
      lines.push(`Running: ${session.running.label}${progress}, ${formatElapsed(session.running.startedAt)} elapsed`);
      if (session.running.controller.signal.aborted) {
        lines.push('Cancellation requested.');
      }
    }

    if (session.lastReport) {
      const report = session.lastReport;
      const succeeded = report.tasks.filter((task) => task.status === 'succeeded').length;
      lines.push(`Last report: ${report.overallStatus}, ${succeeded}/${report.tasks.length} sections succeeded`);
      const failed = failedTasks(report);
      if (failed.length > 0) {
        lines.push(`Failed: ${failed.map((task) => task.descriptor.name).join(', ')}`);
      }
    }

    await ctx.reply(lines.join('\n'));
  });

  bot.command('retry', async (ctx) => {
    const chatId = ctx.chat.id;
    const sections = commandArguments(ctx.message?.text);
    console.log(`[analyze] /retry received ${contextTag(ctx)} sections=${sections.join(',') || 'failed'}`);
    const session = deps.sessions.get(chatId);

    if (!session.lastReport || !session.document) {
      await ctx.reply('There is no report to retry yet.');
      return;
    }
    if (session.running) {
      await ctx.reply('Something is already running. Use /cancel to stop it first.');
      return;
    }

    const known = new Set(session.lastReport.tasks.map((task) => task.descriptor.name));
    const unknown = sections.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      await ctx.reply(`Unknown sections: ${unknown.join(', ')}. This report has: ${[...known].join(', ')}`);
      return;
    }

    const retryable = session.lastReport.tasks.filter(
      (task) => task.status === 'failed' || task.error?.kind === 'cancelled',
    );
    if (sections.length === 0 && retryable.length === 0) {
      await ctx.reply('Every section of the last report succeeded. Name sections to run them again, e.g. /retry summary');
      return;
    }

    startRetryJob(deps, ctx.api, chatId, sections.length > 0 ? sections : undefined);
    const count = sections.length > 0 ? sections.length : retryable.length;
    await ctx.reply(`Re-running ${count} section${count === 1 ? '' : 's'}.`);
  });
}
