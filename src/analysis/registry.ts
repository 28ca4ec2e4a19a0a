import { ConfigurationError } from '../errors.js';
import { DOCUMENT_TYPES, type DocumentType, type TaskDescriptor } from '../types.js';

function section(name: string, title: string, required = true): TaskDescriptor {
  return Object.freeze({ name, title, promptTemplateId: `section.${name}`, required });
}

const SUMMARY = section('summary', 'Summary');
const KEYWORDS = section('keywords', 'Keywords');
const DETAILED_ANALYSIS = section('detailed-analysis', 'Detailed Analysis');

const REGISTRY: Readonly<Record<DocumentType, readonly TaskDescriptor[]>> = Object.freeze({
  research_paper: Object.freeze([
    SUMMARY,
    KEYWORDS,
    DETAILED_ANALYSIS,
    section('methodology', 'Methodology'),
    section('citations', 'Citations & References'),
    section('research-questions', 'Research Questions'),
    section('gaps', 'Research Gaps'),
    section('future-directions', 'Future Directions'),
  ]),
  study_material: Object.freeze([
    SUMMARY,
    KEYWORDS,
    DETAILED_ANALYSIS,
    section('concepts', 'Key Concepts'),
    section('examples', 'Examples & Cases'),
    section('questions', 'Study Questions'),
    section('difficulty', 'Difficulty Assessment', false),
  ]),
  essay: Object.freeze([
    SUMMARY,
    KEYWORDS,
    DETAILED_ANALYSIS,
    section('structure', 'Structure'),
    section('arguments', 'Arguments'),
    section('improvements', 'Suggested Improvements', false),
    section('sources', 'Sources'),
  ]),
  report: Object.freeze([
    SUMMARY,
    KEYWORDS,
    DETAILED_ANALYSIS,
    section('structure', 'Structure'),
    section('findings', 'Findings'),
    section('recommendations', 'Recommendations'),
    section('citations', 'References'),
  ]),
  general_academic: Object.freeze([
    SUMMARY,
    KEYWORDS,
    DETAILED_ANALYSIS,
    section('structure', 'Structure'),
    section('main-points', 'Main Points'),
    section('context', 'Context', false),
  ]),
});

const DOCUMENT_TYPE_LABELS: Readonly<Record<DocumentType, string>> = {
  research_paper: 'research paper',
  study_material: 'study material',
  essay: 'essay',
  report: 'report',
  general_academic: 'academic document',
};

export function documentTypeLabel(docType: DocumentType): string {
  return DOCUMENT_TYPE_LABELS[docType];
}

export function isDocumentType(value: string): value is DocumentType {
  return (DOCUMENT_TYPES as readonly string[]).includes(value);
}

export class TaskRegistry {
  constructor(private readonly entries: Readonly<Partial<Record<DocumentType, readonly TaskDescriptor[]>>> = REGISTRY) {}

  documentTypes(): readonly DocumentType[] {
    return DOCUMENT_TYPES;
  }

  tasksFor(docType: DocumentType): readonly TaskDescriptor[] {
    const tasks = this.entries[docType];
    if (!tasks || tasks.length === 0) {
      throw new ConfigurationError(`No analysis tasks registered for document type "${docType}"`);
    }
    return tasks;
  }

  describe(docType: DocumentType): string {
    return documentTypeLabel(docType);
  }
}
