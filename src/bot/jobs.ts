import { CancelledError, isAnalysisError, toErrorMessage } from '../errors.js';
import { buildLiteratureQuery, formatSearchResults, searchRelatedLiterature } from '../research/search.js';
import type { AnalysisTask, DocumentType, Report, ToolParameters } from '../types.js';
import {
  sendJobFailedNotification,
  sendReportNotification,
  sendTextResult,
  type ChatMessenger,
} from './notifications.js';
import type { RunningJob } from './session.js';
import type { BotDependencies } from './types.js';

export interface AnalysisJobInput {
  documentType?: DocumentType;
  exclude?: string[];
}

function describeError(error: unknown): string {
  return isAnalysisError(error) ? error.message : toErrorMessage(error);
}

function trackProgress(job: RunningJob) {
  return (task: AnalysisTask, index: number, total: number) => {
    job.completed = index + 1;
    job.total = total;
    console.log(`[bot] ${job.label} ${index + 1}/${total} ${task.descriptor.name}=${task.status}`);
  };
}

/**
 * Runs work outside the update handler so the bot keeps polling (and can receive /cancel)
 * while the analysis is in flight.
 */
function runDetached(
  deps: BotDependencies,
  api: ChatMessenger,
  chatId: number,
  job: RunningJob,
  work: () => Promise<void>,
): void {
  const runNow = async () => {
    try {
      await work();
    } catch (error) {
      if (error instanceof CancelledError) {
        await api.sendMessage(chatId, `${job.label} cancelled.`);
      } else {
        console.error(`[bot] ${job.label} failed chat=${chatId}:`, error);
        await sendJobFailedNotification(api, chatId, job.label, describeError(error));
      }
    } finally {
      deps.sessions.finishJob(chatId, job);
    }
  };

  void runNow().catch((error) => {
    console.error(`[bot] could not deliver ${job.label} result chat=${chatId}:`, error);
  });
}

async function deliverReport(deps: BotDependencies, api: ChatMessenger, chatId: number, report: Report, sourceName: string) {
  deps.sessions.get(chatId).lastReport = report;

  let archivedPath: string | undefined;
  if (deps.archive) {
    try {
      archivedPath = await deps.archive.save(report, sourceName);
    } catch (error) {
      console.error(`[bot] archiving report failed chat=${chatId}:`, error);
    }
  }

  await sendReportNotification({ api, chatId, report, sourceName, archivedPath });
}

/** Returns false if the chat has no document or already runs a job. */
export function startAnalysisJob(
  deps: BotDependencies,
  api: ChatMessenger,
  chatId: number,
  input: AnalysisJobInput = {},
): boolean {
  const document = deps.sessions.get(chatId).document;
  if (!document) return false;

  const job = deps.sessions.startJob(chatId, { kind: 'analysis', label: 'Analysis', total: 0 });
  if (!job) return false;

  runDetached(deps, api, chatId, job, async () => {
    const report = await deps.runtime.orchestrator.analyze(document.text, {
      documentType: input.documentType,
      exclude: input.exclude,
      signal: job.controller.signal,
      onTaskSettled: trackProgress(job),
    });
    await deliverReport(deps, api, chatId, report, document.fileName);
  });
  return true;
}

export function startRetryJob(deps: BotDependencies, api: ChatMessenger, chatId: number, sections?: string[]): boolean {
  const session = deps.sessions.get(chatId);
  const { document, lastReport } = session;
  if (!document || !lastReport) return false;

  const job = deps.sessions.startJob(chatId, { kind: 'retry', label: 'Retry', total: 0 });
  if (!job) return false;

  runDetached(deps, api, chatId, job, async () => {
    const report = await deps.runtime.orchestrator.rerun(lastReport, document.text, {
      sections,
      signal: job.controller.signal,
      onTaskSettled: trackProgress(job),
    });
    await deliverReport(deps, api, chatId, report, document.fileName);
  });
  return true;
}

export function startToolJob(
  deps: BotDependencies,
  api: ChatMessenger,
  chatId: number,
  toolName: string,
  parameters: ToolParameters,
): boolean {
  const document = deps.sessions.get(chatId).document;
  if (!document) return false;

  const descriptor = deps.runtime.tools.resolve(toolName);
  const job = deps.sessions.startJob(chatId, { kind: 'tool', label: descriptor.title, total: 1 });
  if (!job) return false;

  runDetached(deps, api, chatId, job, async () => {
    const toolParameters = { ...parameters };
    if (descriptor.name === 'related-papers' && deps.config.tavilyApiKey && !('searchResults' in toolParameters)) {
      try {
        const search = await searchRelatedLiterature(deps.config, buildLiteratureQuery(document.text));
        toolParameters.searchResults = formatSearchResults(search);
      } catch (error) {
        console.warn(`[bot] web search failed, continuing without results: ${toErrorMessage(error)}`);
      }
    }

    const output = await deps.runtime.tools.invoke(descriptor.name, document.text, toolParameters, {
      signal: job.controller.signal,
    });
    job.completed = 1;
    await sendTextResult(api, chatId, descriptor.title, output);
  });
  return true;
}
