/**
 * @file classifier.test.ts
 * @description Unit tests for document type detection
 * @depends vitest, src/analysis/classifier
 */

import { describe, expect, it } from 'vitest';
import { DocumentClassifier, textStats } from '../../src/analysis/classifier.js';

const classifier = new DocumentClassifier();

const PAPER = [
  'Abstract',
  'We study sleep and memory.',
  '1. Introduction',
  'Sleep matters.',
  '2. Methods',
  'We recruited forty students.',
  '3. Results',
  'Recall improved.',
  'References',
  'Smith J. Sleep. Journal of Sleep.',
].join('\n');

describe('textStats', () => {
  it('counts words and characters', () => {
    expect(textStats('one two  three\nfour')).toEqual({ words: 4, characters: 19 });
  });
});

describe('DocumentClassifier', () => {
  it('detects a research paper from its structure', () => {
    const result = classifier.explain(PAPER);

    expect(result.documentType).toBe('research_paper');
    expect(result.scores.research_paper).toBe(7);
    expect(result.confidence).toBe(1);
    expect(result.signals).toEqual([
      'research_paper: abstract',
      'research_paper: methodology section',
      'research_paper: results or discussion section',
      'research_paper: references section',
    ]);
  });

  it('detects a report', () => {
    const text = ['Executive Summary', 'This report reviews branch sales.', 'Key Findings', 'Sales rose.', 'Recommendations', 'Hire staff.'].join('\n');

    expect(classifier.explain(text)).toMatchObject({
      documentType: 'report',
      confidence: 1,
      scores: { report: 8 },
    });
  });

  it('detects study material', () => {
    const text = ['Chapter 3: Photosynthesis', 'Learning objectives', 'Describe the light reactions.', 'Review questions', 'What is chlorophyll?'].join('\n');

    const result = classifier.explain(text);
    expect(result.documentType).toBe('study_material');
    expect(result.scores.study_material).toBe(6);
  });

  it('detects an essay', () => {
    const text = 'In this essay I argue that cities should fund libraries. In conclusion, libraries pay for themselves.';

    expect(classifier.classify(text)).toBe('essay');
    expect(classifier.explain(text).scores.essay).toBe(6);
  });

  it('falls back to general_academic without any signal', () => {
    expect(classifier.explain('The weather was pleasant today.')).toEqual({
      documentType: 'general_academic',
      scores: { research_paper: 0, study_material: 0, essay: 0, report: 0, general_academic: 0 },
      signals: [],
      confidence: 0,
      overridden: false,
    });
  });

  it('falls back to general_academic when the best score is weak', () => {
    const result = classifier.explain('Key Findings\nSales rose slightly.');

    expect(result.documentType).toBe('general_academic');
    expect(result.scores.report).toBe(2);
    expect(result.signals).toEqual(['report: findings section']);
  });

  it('breaks ties in favour of research papers', () => {
    const result = classifier.explain('Abstract\nAn executive summary of the work.');

    expect(result.scores.research_paper).toBe(3);
    expect(result.scores.report).toBe(3);
    expect(result.documentType).toBe('research_paper');
    expect(result.confidence).toBe(0.5);
  });
});
