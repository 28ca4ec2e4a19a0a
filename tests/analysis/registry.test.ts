/**
 * @file registry.test.ts
 * @description Unit tests for the document type to section mapping
 * @depends vitest, src/analysis/registry
 */

import { describe, expect, it } from 'vitest';
import { documentTypeLabel, isDocumentType, TaskRegistry } from '../../src/analysis/registry.js';
import { ConfigurationError } from '../../src/errors.js';
import { DOCUMENT_TYPES } from '../../src/types.js';

const registry = new TaskRegistry();

describe('TaskRegistry', () => {
  it('lists the research paper sections in order', () => {
    expect(registry.tasksFor('research_paper').map((task) => task.name)).toEqual([
      'summary',
      'keywords',
      'detailed-analysis',
      'methodology',
      'citations',
      'research-questions',
      'gaps',
      'future-directions',
    ]);
  });

  it('starts every document type with summary, keywords and detailed analysis', () => {
    for (const docType of DOCUMENT_TYPES) {
      expect(registry.tasksFor(docType).slice(0, 3).map((task) => task.name)).toEqual([
        'summary',
        'keywords',
        'detailed-analysis',
      ]);
    }
  });

  it('marks only the documented sections optional', () => {
    const optional = DOCUMENT_TYPES.flatMap((docType) =>
      registry
        .tasksFor(docType)
        .filter((task) => !task.required)
        .map((task) => `${docType}/${task.name}`),
    );

    expect(optional).toEqual([
      'study_material/difficulty',
      'essay/improvements',
      'general_academic/context',
    ]);
  });

  it('keeps section names unique per document type', () => {
    for (const docType of DOCUMENT_TYPES) {
      const names = registry.tasksFor(docType).map((task) => task.name);
      expect(new Set(names).size).toBe(names.length);
    }
  });

  it('derives template ids from section names', () => {
    const [summary] = registry.tasksFor('essay');
    expect(summary).toEqual({ name: 'summary', title: 'Summary', promptTemplateId: 'section.summary', required: true });
    expect(Object.isFrozen(summary)).toBe(true);
  });

  it('raises ConfigurationError for a type without entries', () => {
    const empty = new TaskRegistry({});

    expect(() => empty.tasksFor('essay')).toThrow(ConfigurationError);
    expect(() => empty.tasksFor('essay')).toThrow('No analysis tasks registered for document type "essay"');
  });
});

describe('document type helpers', () => {
  it('labels document types for prompts', () => {
    expect(documentTypeLabel('research_paper')).toBe('research paper');
    expect(documentTypeLabel('general_academic')).toBe('academic document');
    expect(registry.describe('study_material')).toBe('study material');
  });

  it('recognises document type identifiers', () => {
    expect(isDocumentType('essay')).toBe(true);
    expect(isDocumentType('memo')).toBe(false);
  });
});
