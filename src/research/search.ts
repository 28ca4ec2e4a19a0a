import { tavily } from '@tavily/core';
import type { LecternConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

export interface LiteratureResult {
  title: string;
  url: string;
  content: string;
  publishedDate?: string;
}

export interface LiteratureSearch {
  query: string;
  answer: string | null;
  results: LiteratureResult[];
}

const QUERY_STOPWORDS = new Set([
  'abstract',
  'introduction',
  'the',
  'and',
  'for',
  'with',
  'from',
  'this',
  'that',
  'paper',
  'study',
]);

/**
 * Builds a search query from the document's first meaningful line, falling back to its
 * most frequent longer words.
 */
export function buildLiteratureQuery(text: string, maxWords = 12): string {
  const firstLine = text
    .split('\n')
    .map((line) => line.replace(/^#+\s*/, '').trim())
    .find((line) => line.length >= 12 && line.length <= 200 && !/^abstract\b/i.test(line));

  if (firstLine) {
    return `${firstLine.split(/\s+/).slice(0, maxWords).join(' ')} research papers`;
  }

  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().match(/[a-z][a-z-]{4,}/g) ?? []) {
    if (QUERY_STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  const top = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 6)
    .map(([word]) => word);
  return `${top.join(' ')} research papers`.trim();
}

export function formatSearchResults(search: LiteratureSearch): string {
  if (search.results.length === 0) {
    return `Web search for "${search.query}" returned no results.`;
  }

  const lines = [`Web search results for "${search.query}":`];
  if (search.answer) {
    lines.push(`Overview: ${search.answer}`);
  }
  search.results.forEach((result, index) => {
    const published = result.publishedDate ? ` (${result.publishedDate})` : '';
    const snippet = result.content.replace(/\s+/g, ' ').trim().slice(0, 400);
    lines.push(`${index + 1}. ${result.title}${published} - ${result.url}`);
    if (snippet) lines.push(`   ${snippet}`);
  });
  return lines.join('\n');
}

export async function searchRelatedLiterature(
  config: LecternConfig,
  query: string,
  maxResults = 5,
): Promise<LiteratureSearch> {
  if (!config.tavilyApiKey) {
    throw new ConfigurationError('TAVILY_API_KEY is required for web search');
  }

  const client = tavily({ apiKey: config.tavilyApiKey });
  console.log(`[search] querying "${query}"`);
  const response = await client.search(query, {
    searchDepth: 'advanced',
    maxResults,
    includeAnswer: true,
  });

  return {
    query: response.query,
    answer: response.answer ?? null,
    results: response.results.map((result) => ({
      title: result.title,
      url: result.url,
      content: result.content,
      publishedDate: result.publishedDate,
    })),
  };
}
