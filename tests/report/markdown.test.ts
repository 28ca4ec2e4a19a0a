/**
 * @file markdown.test.ts
 * @description Unit tests for Markdown report export and chat summaries
 * @depends vitest, src/report/markdown, tests/helpers/reports
 */

import { describe, expect, it } from 'vitest';
import { formatReportSummary, renderReportFrontmatter, renderReportMarkdown } from '../../src/report/markdown.js';
import { descriptor, makePartialReport, makeReport } from '../helpers/reports.js';

describe('renderReportFrontmatter', () => {
  it('quotes strings and lists failed sections', () => {
    expect(renderReportFrontmatter(makePartialReport(), 'sleep "study".pdf')).toBe(
      [
        '---',
        'id: "12345678-aaaa-4bbb-8ccc-1234567890ab"',
        'source: "sleep \\"study\\".pdf"',
        'documentType: "research_paper"',
        'overallStatus: "partial_failure"',
        'cancelled: true',
        'model: "test-model"',
        'generatedAt: "2026-03-01T10:02:00.000Z"',
        'failedSections:',
        '  - "keywords"',
        '---',
      ].join('\n'),
    );
  });

  it('writes an empty list when nothing failed', () => {
    expect(renderReportFrontmatter(makeReport(), 'paper.pdf')).toContain('\nfailedSections: []\n---');
  });
});

describe('renderReportMarkdown', () => {
  it('renders every section with its outcome', () => {
    const markdown = renderReportMarkdown(makePartialReport(), { sourceName: 'paper.pdf' });
    const body = markdown.slice(markdown.indexOf('# Analysis of'));

    expect(body).toBe(
      [
        '# Analysis of paper.pdf',
        'Document type: research paper (confidence 0.8), 1200 words',
        '> Analysis was cancelled before every section finished.',
        '## Summary\n\nA summary.',
        '## Keywords\n\n> Section failed (rate_limited: Too Many Requests)',
        '## Research Gaps\n\n> Section skipped: Analysis was cancelled before this section ran.',
      ].join('\n\n') + '\n',
    );
  });

  it('notes sections skipped on request and manual document types', () => {
    const base = makeReport();
    const report = makeReport({
      documentType: 'study_material',
      classification: { ...base.classification, documentType: 'study_material', confidence: 1, overridden: true },
      tasks: [
        base.tasks[0],
        { descriptor: descriptor('difficulty', 'Difficulty Assessment', false), sourceText: 'text', status: 'skipped' },
      ],
    });

    const markdown = renderReportMarkdown(report, { sourceName: 'notes.md' });

    expect(markdown).toContain('Document type: study material (chosen manually), 1200 words\n\n## Summary');
    expect(markdown.endsWith('## Difficulty Assessment\n\n> Section skipped on request.\n')).toBe(true);
  });
});

describe('formatReportSummary', () => {
  it('summarises a complete report', () => {
    expect(formatReportSummary(makeReport())).toBe(
      'Analysis complete: 3/3 sections succeeded.\nDocument type: research paper',
    );
  });

  it('names failed sections with kind and message', () => {
    expect(formatReportSummary(makePartialReport())).toBe(
      [
        'Analysis partially failed: 1/3 sections succeeded.',
        'Document type: research paper',
        '',
        'Failed sections:',
        '- Keywords [keywords]: rate_limited: Too Many Requests',
        '',
        'Analysis was cancelled; remaining sections were skipped.',
      ].join('\n'),
    );
  });
});
