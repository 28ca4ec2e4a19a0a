import { v4 as uuidv4 } from 'uuid';
import {
  CancelledError,
  CompletionError,
  ConfigurationError,
  ExtractionError,
} from '../errors.js';
import type { CompletionClient } from '../llm/completionClient.js';
import type {
  AnalysisTask,
  Classification,
  DocumentType,
  OverallStatus,
  Report,
  TaskDescriptor,
  TextStats,
} from '../types.js';
import { DocumentClassifier, textStats } from './classifier.js';
import { TaskRegistry } from './registry.js';

export interface AnalyzeOptions {
  /** Skip classification and analyse as this type. */
  documentType?: DocumentType;
  /** Optional sections to leave out. Required sections always run. */
  exclude?: readonly string[];
  signal?: AbortSignal;
  onTaskSettled?: (task: AnalysisTask, index: number, total: number) => void;
}

export interface RerunOptions {
  /** Sections to run again; defaults to every failed or cancelled section. */
  sections?: readonly string[];
  signal?: AbortSignal;
  onTaskSettled?: (task: AnalysisTask, index: number, total: number) => void;
}

export interface OrchestratorDependencies {
  client: CompletionClient;
  classifier?: DocumentClassifier;
  registry?: TaskRegistry;
  now?: () => Date;
}

interface RunInput {
  tasks: AnalysisTask[];
  pending: ReadonlySet<number>;
  documentType: DocumentType;
  signal?: AbortSignal;
  onTaskSettled?: (task: AnalysisTask, index: number, total: number) => void;
}

export function computeOverallStatus(tasks: readonly AnalysisTask[]): OverallStatus {
  const succeeded = tasks.filter((task) => task.status === 'succeeded').length;
  const failed = tasks.filter((task) => task.status === 'failed').length;
  if (succeeded === 0) return 'total_failure';
  if (failed === 0) return 'complete';
  return 'partial_failure';
}

export function failedTasks(report: Report): AnalysisTask[] {
  return report.tasks.filter((task) => task.status === 'failed');
}

function requireText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ExtractionError('Extracted text is empty; there is nothing to analyze.');
  }
  return trimmed;
}

function createTask(descriptor: TaskDescriptor, sourceText: string): AnalysisTask {
  return { descriptor, sourceText, status: 'pending' };
}

function needsRerun(task: AnalysisTask): boolean {
  return task.status === 'failed' || task.error?.kind === 'cancelled';
}

function freezeReport(report: Report): Report {
  for (const task of report.tasks) {
    if (task.error) Object.freeze(task.error);
    Object.freeze(task);
  }
  Object.freeze(report.tasks);
  Object.freeze(report.classification.scores);
  Object.freeze(report.classification.signals);
  Object.freeze(report.classification);
  Object.freeze(report.stats);
  return Object.freeze(report);
}

export class AnalysisOrchestrator {
  private readonly client: CompletionClient;
  private readonly classifier: DocumentClassifier;
  private readonly registry: TaskRegistry;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.client = deps.client;
    this.classifier = deps.classifier ?? new DocumentClassifier();
    this.registry = deps.registry ?? new TaskRegistry();
    this.now = deps.now ?? (() => new Date());
  }

  async analyze(text: string, options: AnalyzeOptions = {}): Promise<Report> {
    const sourceText = requireText(text);
    const startedAt = this.now().toISOString();
    const classification = this.classify(sourceText, options.documentType);
    const descriptors = this.registry.tasksFor(classification.documentType);
    const exclude = new Set(options.exclude ?? []);

    const tasks = descriptors.map((descriptor) => createTask(descriptor, sourceText));
    const pending = new Set<number>();
    tasks.forEach((task, index) => {
      if (!task.descriptor.required && exclude.has(task.descriptor.name)) {
        task.status = 'skipped';
        return;
      }
      if (task.descriptor.required && exclude.has(task.descriptor.name)) {
        console.warn(`[orchestrator] ignoring exclusion of required section ${task.descriptor.name}`);
      }
      pending.add(index);
    });

    console.log(
      `[orchestrator] analyzing ${classification.documentType}${classification.overridden ? ' (chosen by caller)' : ''}: ${pending.size}/${tasks.length} sections`,
    );

    const cancelled = await this.runTasks({
      tasks,
      pending,
      documentType: classification.documentType,
      signal: options.signal,
      onTaskSettled: options.onTaskSettled,
    });

    return this.buildReport({ classification, tasks, cancelled, startedAt, stats: textStats(sourceText) });
  }

  /**
   * Runs the named sections of an earlier report again and returns a new report.
   * Sections that are not re-run keep their earlier outcome.
   */
  async rerun(report: Report, text: string, options: RerunOptions = {}): Promise<Report> {
    const sourceText = requireText(text);
    const startedAt = this.now().toISOString();
    const known = new Set(report.tasks.map((task) => task.descriptor.name));
    const targets = new Set(
      options.sections ?? report.tasks.filter(needsRerun).map((task) => task.descriptor.name),
    );

    const unknown = Array.from(targets).filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Report ${report.id} has no section named ${unknown.join(', ')}. Sections: ${Array.from(known).join(', ')}`,
      );
    }

    const pending = new Set<number>();
    const tasks = report.tasks.map((previous, index) => {
      if (!targets.has(previous.descriptor.name)) {
        return { ...previous, sourceText };
      }
      pending.add(index);
      return createTask(previous.descriptor, sourceText);
    });

    console.log(`[orchestrator] re-running ${pending.size} section(s) of report ${report.id}`);

    const cancelled = await this.runTasks({
      tasks,
      pending,
      documentType: report.documentType,
      signal: options.signal,
      onTaskSettled: options.onTaskSettled,
    });

    return this.buildReport({
      classification: report.classification,
      tasks,
      cancelled,
      startedAt,
      stats: textStats(sourceText),
    });
  }

  private classify(text: string, override: DocumentType | undefined): Classification {
    const classification = this.classifier.explain(text);
    if (!override) return classification;
    return { ...classification, documentType: override, confidence: 1, overridden: true };
  }

  private async runTasks(input: RunInput): Promise<boolean> {
    const { tasks, signal } = input;
    const variables = { documentLabel: this.registry.describe(input.documentType) };
    let cancelled = false;

    for (const [index, task] of tasks.entries()) {
      if (!input.pending.has(index)) continue;

      if (cancelled || signal?.aborted) {
        cancelled = true;
        task.status = 'skipped';
        task.error = { kind: 'cancelled', message: 'Analysis was cancelled before this section ran.' };
        input.onTaskSettled?.(task, index, tasks.length);
        continue;
      }

      const started = this.now();
      task.startedAt = started.toISOString();
      try {
        task.result = await this.client.complete(task.descriptor.promptTemplateId, task.sourceText, {
          variables: { ...variables, sectionTitle: task.descriptor.title },
          signal,
          label: task.descriptor.name,
        });
        task.status = 'succeeded';
      } catch (error) {
        if (error instanceof CancelledError) {
          cancelled = true;
          task.status = 'skipped';
          task.error = { kind: 'cancelled', message: 'Analysis was cancelled while this section was running.' };
        } else if (error instanceof CompletionError) {
          task.status = 'failed';
          task.error = { kind: error.kind, message: error.message, attempts: error.info.attempts };
        } else {
          throw error;
        }
      }

      const completed = this.now();
      task.completedAt = completed.toISOString();
      task.durationMs = completed.getTime() - started.getTime();
      input.onTaskSettled?.(task, index, tasks.length);
    }

    if (cancelled) {
      console.warn('[orchestrator] analysis cancelled, returning partial report');
    }
    return cancelled;
  }

  private buildReport(input: {
    classification: Classification;
    tasks: AnalysisTask[];
    cancelled: boolean;
    startedAt: string;
    stats: TextStats;
  }): Report {
    const report: Report = {
      id: uuidv4(),
      documentType: input.classification.documentType,
      classification: input.classification,
      tasks: input.tasks,
      overallStatus: computeOverallStatus(input.tasks),
      cancelled: input.cancelled,
      model: this.client.modelId,
      startedAt: input.startedAt,
      completedAt: this.now().toISOString(),
      stats: input.stats,
    };

    const failed = input.tasks.filter((task) => task.status === 'failed').map((task) => task.descriptor.name);
    console.log(
      `[orchestrator] report ${report.id} ${report.overallStatus}${failed.length > 0 ? ` (failed: ${failed.join(', ')})` : ''}`,
    );
    return freezeReport(report);
  }
}
