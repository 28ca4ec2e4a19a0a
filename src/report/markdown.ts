import { documentTypeLabel } from '../analysis/registry.js';
import type { AnalysisTask, OverallStatus, Report } from '../types.js';

const STATUS_LABELS: Readonly<Record<OverallStatus, string>> = {
  complete: 'complete',
  partial_failure: 'partially failed',
  total_failure: 'failed',
};

function yamlString(value: string): string {
  const normalized = value.replace(/\s+/g, ' ').trim();
  const escaped = normalized.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `"${escaped}"`;
}

function describeFailure(task: AnalysisTask): string {
  if (!task.error) return 'unknown error';
  return `${task.error.kind}: ${task.error.message}`;
}

export function renderReportFrontmatter(report: Report, sourceName: string): string {
  const failed = report.tasks.filter((task) => task.status === 'failed');
  const failedLines =
    failed.length === 0
      ? ['failedSections: []']
      : ['failedSections:', ...failed.map((task) => `  - ${yamlString(task.descriptor.name)}`)];

  return [
    '---',
    `id: ${yamlString(report.id)}`,
    `source: ${yamlString(sourceName)}`,
    `documentType: ${yamlString(report.documentType)}`,
    `overallStatus: ${yamlString(report.overallStatus)}`,
    `cancelled: ${report.cancelled}`,
    `model: ${yamlString(report.model)}`,
    `generatedAt: ${yamlString(report.completedAt)}`,
    ...failedLines,
    '---',
  ].join('\n');
}

function renderSection(task: AnalysisTask): string {
  let body: string;
  switch (task.status) {
    case 'succeeded':
      body = task.result ?? '';
      break;
    case 'failed':
      body = `> Section failed (${describeFailure(task)})`;
      break;
    case 'skipped':
      body = task.error ? `> Section skipped: ${task.error.message}` : '> Section skipped on request.';
      break;
    default:
      body = '> Section was not run.';
  }
  return `## ${task.descriptor.title}\n\n${body}`;
}

function describeClassification(report: Report): string {
  const label = documentTypeLabel(report.documentType);
  const basis = report.classification.overridden
    ? 'chosen manually'
    : `confidence ${report.classification.confidence}`;
  return `Document type: ${label} (${basis}), ${report.stats.words} words`;
}

export function renderReportMarkdown(report: Report, options: { sourceName: string }): string {
  const parts = [
    renderReportFrontmatter(report, options.sourceName),
    `# Analysis of ${options.sourceName}`,
    describeClassification(report),
  ];
  if (report.cancelled) {
    parts.push('> Analysis was cancelled before every section finished.');
  }
  parts.push(...report.tasks.map(renderSection));
  return `${parts.join('\n\n')}\n`;
}

/** Short plain-text status for chat replies and terminal output. */
export function formatReportSummary(report: Report): string {
  const succeeded = report.tasks.filter((task) => task.status === 'succeeded').length;
  const failed = report.tasks.filter((task) => task.status === 'failed');
  const lines = [
    `Analysis ${STATUS_LABELS[report.overallStatus]}: ${succeeded}/${report.tasks.length} sections succeeded.`,
    `Document type: ${documentTypeLabel(report.documentType)}`,
  ];

  if (failed.length > 0) {
    lines.push('');
    lines.push('Failed sections:');
    for (const task of failed) {
      lines.push(`- ${task.descriptor.title} [${task.descriptor.name}]: ${describeFailure(task)}`);
    }
  }

  if (report.cancelled) {
    lines.push('');
    lines.push('Analysis was cancelled; remaining sections were skipped.');
  }

  return lines.join('\n');
}
