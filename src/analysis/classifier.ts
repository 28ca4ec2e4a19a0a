import type { Classification, DocumentType, TextStats } from '../types.js';

type ClassifiedType = Exclude<DocumentType, 'general_academic'>;

interface TextFeatures {
  text: string;
  headings: Set<string>;
  words: number;
  citations: number;
}

interface Signal {
  documentType: ClassifiedType;
  label: string;
  weight: number;
  matches: (features: TextFeatures) => boolean;
}

const MIN_CONFIDENT_SCORE = 3;

// Earlier entries win ties.
const TIE_BREAK_ORDER: readonly ClassifiedType[] = ['research_paper', 'report', 'study_material', 'essay'];

const HEADING_NUMBERING = /^(?:\d+(?:\.\d+)*\.?|[ivx]+\.)\s+/i;
const NUMERIC_CITATION = /\[\d+(?:\s*[,–-]\s*\d+)*\]/g;
const AUTHOR_YEAR_CITATION = /\([A-Z][A-Za-z'-]+(?: et al\.)?(?:,| and [A-Z][A-Za-z'-]+,)? (?:19|20)\d{2}[a-z]?\)/g;
const ET_AL = /\bet al\./g;
const INSTRUCTIONAL_CUES =
  /\b(?:remember that|note that|for example|you should|you will learn|let us|let's|key terms?|definition)\b/gi;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function textStats(text: string): TextStats {
  return { words: countWords(text), characters: text.length };
}

function extractHeadings(text: string): Set<string> {
  const headings = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.length > 80 || /[.,;?!]$/.test(trimmed)) continue;

    const normalized = trimmed
      .replace(/^#+\s*/, '')
      .replace(HEADING_NUMBERING, '')
      .replace(/[:*]+$/, '')
      .trim()
      .toLowerCase();
    if (!normalized || countWords(normalized) > 8) continue;
    headings.add(normalized);
  }
  return headings;
}

function extractFeatures(text: string): TextFeatures {
  return {
    text,
    headings: extractHeadings(text),
    words: countWords(text),
    citations:
      countMatches(text, NUMERIC_CITATION) +
      countMatches(text, AUTHOR_YEAR_CITATION) +
      countMatches(text, ET_AL),
  };
}

function hasHeading(...names: string[]): (features: TextFeatures) => boolean {
  return (features) => names.some((name) => features.headings.has(name));
}

function mentions(pattern: RegExp): (features: TextFeatures) => boolean {
  return (features) => pattern.test(features.text);
}

const SIGNALS: readonly Signal[] = [
  { documentType: 'research_paper', label: 'abstract', weight: 3, matches: mentions(/^\s*abstract\b/im) },
  {
    documentType: 'research_paper',
    label: 'methodology section',
    weight: 2,
    matches: hasHeading('methodology', 'methods', 'materials and methods', 'research methodology', 'experimental setup'),
  },
  {
    documentType: 'research_paper',
    label: 'results or discussion section',
    weight: 1,
    matches: hasHeading('results', 'discussion', 'results and discussion', 'related work', 'literature review'),
  },
  { documentType: 'research_paper', label: 'references section', weight: 1, matches: hasHeading('references', 'bibliography') },
  {
    documentType: 'research_paper',
    label: 'citation density',
    weight: 2,
    matches: (features) =>
      features.citations >= 3 && (features.citations * 1000) / Math.max(features.words, 1) >= 5,
  },
  {
    documentType: 'research_paper',
    label: 'scholarly identifiers',
    weight: 1,
    matches: mentions(/\b(?:doi|arxiv):|\b10\.\d{4,9}\//i),
  },

  { documentType: 'report', label: 'executive summary', weight: 3, matches: mentions(/\bexecutive summary\b/i) },
  { documentType: 'report', label: 'findings section', weight: 2, matches: hasHeading('findings', 'key findings') },
  { documentType: 'report', label: 'recommendations section', weight: 2, matches: hasHeading('recommendations') },
  { documentType: 'report', label: 'report framing', weight: 1, matches: mentions(/\b(?:this report|prepared (?:for|by))\b/i) },
  { documentType: 'report', label: 'table of contents', weight: 1, matches: mentions(/\btable of contents\b/i) },

  {
    documentType: 'study_material',
    label: 'learning objectives',
    weight: 3,
    matches: mentions(/\b(?:learning objectives|learning outcomes|study guide|lecture notes)\b/i),
  },
  {
    documentType: 'study_material',
    label: 'exercises',
    weight: 2,
    matches: mentions(/\b(?:exercises?|practice problems?|review questions|self-check|quiz)\b/i),
  },
  {
    documentType: 'study_material',
    label: 'chapter or lesson framing',
    weight: 1,
    matches: mentions(/^\s*(?:chapter|lesson|unit|module|lecture)\s+\d+/im),
  },
  {
    documentType: 'study_material',
    label: 'instructional phrasing',
    weight: 2,
    matches: (features) => countMatches(features.text, INSTRUCTIONAL_CUES) >= 3,
  },

  { documentType: 'essay', label: 'essay framing', weight: 3, matches: mentions(/\bthis essay\b/i) },
  {
    documentType: 'essay',
    label: 'argumentative voice',
    weight: 2,
    matches: mentions(/\b(?:i argue|i contend|i will argue|i believe|my argument|my thesis)\b/i),
  },
  { documentType: 'essay', label: 'concluding phrase', weight: 1, matches: mentions(/\bin conclusion\b/i) },
  { documentType: 'essay', label: 'works cited', weight: 1, matches: hasHeading('works cited') },
];

export class DocumentClassifier {
  classify(text: string): DocumentType {
    return this.explain(text).documentType;
  }

  explain(text: string): Classification {
    const features = extractFeatures(text);
    const scores: Record<DocumentType, number> = {
      research_paper: 0,
      study_material: 0,
      essay: 0,
      report: 0,
      general_academic: 0,
    };
    const signals: string[] = [];

    for (const signal of SIGNALS) {
      if (!signal.matches(features)) continue;
      scores[signal.documentType] += signal.weight;
      signals.push(`${signal.documentType}: ${signal.label}`);
    }

    let best: ClassifiedType | null = null;
    for (const type of TIE_BREAK_ORDER) {
      if (scores[type] >= MIN_CONFIDENT_SCORE && (best === null || scores[type] > scores[best])) {
        best = type;
      }
    }

    if (best === null) {
      return { documentType: 'general_academic', scores, signals, confidence: 0, overridden: false };
    }

    const total = TIE_BREAK_ORDER.reduce((sum, type) => sum + scores[type], 0);
    return {
      documentType: best,
      scores,
      signals,
      confidence: Math.round((scores[best] / total) * 100) / 100,
      overridden: false,
    };
  }
}
