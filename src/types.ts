import type { CompletionErrorKind } from './errors.js';

export const DOCUMENT_TYPES = [
  'research_paper',
  'study_material',
  'essay',
  'report',
  'general_academic',
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export interface TaskDescriptor {
  name: string;
  title: string;
  promptTemplateId: string;
  required: boolean;
}

export type TaskStatus = 'pending' | 'succeeded' | 'failed' | 'skipped';

export interface TaskFailure {
  kind: CompletionErrorKind | 'cancelled';
  message: string;
  attempts?: number;
}

export interface AnalysisTask {
  descriptor: TaskDescriptor;
  sourceText: string;
  status: TaskStatus;
  result?: string;
  error?: TaskFailure;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
}

export type OverallStatus = 'complete' | 'partial_failure' | 'total_failure';

export interface Classification {
  documentType: DocumentType;
  scores: Record<DocumentType, number>;
  signals: string[];
  confidence: number;
  overridden: boolean;
}

export interface TextStats {
  words: number;
  characters: number;
}

export interface Report {
  id: string;
  documentType: DocumentType;
  classification: Classification;
  tasks: readonly AnalysisTask[];
  overallStatus: OverallStatus;
  cancelled: boolean;
  model: string;
  startedAt: string;
  completedAt: string;
  stats: TextStats;
}

export interface ToolDescriptor {
  name: string;
  title: string;
  description: string;
  promptTemplateId: string;
  defaults: Record<string, string>;
}

export type ToolParameters = Record<string, string | number | boolean>;
