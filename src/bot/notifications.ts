import { InputFile } from 'grammy';
import { renderReportMarkdown, formatReportSummary } from '../report/markdown.js';
import type { Report } from '../types.js';

// Telegram rejects messages above 4096 characters.
const MAX_MESSAGE_LENGTH = 4000;

export function splitMessage(text: string, limit = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > limit) {
    let cut = remaining.lastIndexOf('\n', limit);
    if (cut <= 0) cut = limit;
    chunks.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut).replace(/^\n/, '');
  }
  if (remaining) chunks.push(remaining);
  return chunks;
}

/** The part of grammy's `Api` that job results are delivered through. */
export interface ChatMessenger {
  sendMessage(chatId: number, text: string): Promise<unknown>;
  sendDocument(chatId: number, document: InputFile): Promise<unknown>;
}

function reportFileName(sourceName: string): string {
  const stem = sourceName.replace(/\.[^.]+$/, '') || 'document';
  return `${stem}-analysis.md`;
}

export interface ReportNotificationInput {
  api: ChatMessenger;
  chatId: number;
  report: Report;
  sourceName: string;
  archivedPath?: string;
}

export async function sendReportNotification(input: ReportNotificationInput): Promise<void> {
  const lines = [formatReportSummary(input.report)];
  if (input.archivedPath) {
    lines.push('');
    lines.push(`Saved as ${input.archivedPath}`);
  }
  if (input.report.overallStatus !== 'complete' || input.report.cancelled) {
    lines.push('');
    lines.push('Use /retry to run the failed or skipped sections again.');
  }

  await input.api.sendMessage(input.chatId, lines.join('\n'));

  const markdown = renderReportMarkdown(input.report, { sourceName: input.sourceName });
  await input.api.sendDocument(
    input.chatId,
    new InputFile(Buffer.from(markdown, 'utf-8'), reportFileName(input.sourceName)),
  );
}

export async function sendTextResult(api: ChatMessenger, chatId: number, title: string, body: string): Promise<void> {
  for (const chunk of splitMessage(`${title}\n\n${body}`)) {
    await api.sendMessage(chatId, chunk);
  }
}

export async function sendJobFailedNotification(
  api: ChatMessenger,
  chatId: number,
  label: string,
  errorMessage: string,
): Promise<void> {
  const errorLine = errorMessage.length > 300 ? `${errorMessage.slice(0, 297)}...` : errorMessage;
  await api.sendMessage(chatId, [`${label} failed.`, `Error: ${errorLine}`].join('\n'));
}
