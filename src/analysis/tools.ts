import { ConfigurationError, ExtractionError, UnknownToolError } from '../errors.js';
import type { CompletionClient } from '../llm/completionClient.js';
import type { ToolDescriptor, ToolParameters } from '../types.js';

function tool(
  name: string,
  title: string,
  description: string,
  defaults: Record<string, string> = {},
): ToolDescriptor {
  return Object.freeze({
    name,
    title,
    description,
    promptTemplateId: `tool.${name}`,
    defaults: Object.freeze(defaults),
  });
}

export const TOOLS: readonly ToolDescriptor[] = Object.freeze([
  tool('related-papers', 'Related Papers', 'Suggest related papers, research areas and search strategies.', {
    searchResults: 'No web search results were supplied.',
  }),
  tool('research-questions', 'Research Questions', 'Generate research questions for future investigation.', {
    count: '8',
  }),
  tool('build-hypothesis', 'Hypotheses', "Propose testable hypotheses from the document's findings and gaps."),
  tool('research-proposal', 'Research Proposal', 'Draft a research proposal outline that builds on the document.'),
  tool('flashcards', 'Flashcards', 'Create question/answer flashcards from the material.', { count: '15' }),
  tool('practice-questions', 'Practice Questions', 'Write practice questions with answers.', {
    difficulty: 'mixed',
    questionTypes: 'multiple choice, short answer, essay',
  }),
  tool('study-guide', 'Study Guide', 'Build a structured study guide.', { topic: 'Academic Material' }),
]);

/** `RelatedPapers`, `related_papers` and `related papers` all become `related-papers`. */
export function normalizeToolName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/[\s_]+/g, '-')
    .toLowerCase();
}

/** Parses `key=value` tokens. Numeric and boolean literals keep their type. */
export function parseToolParameters(tokens: readonly string[]): ToolParameters {
  const parameters: ToolParameters = {};
  for (const token of tokens) {
    const separator = token.indexOf('=');
    if (separator <= 0) {
      throw new ConfigurationError(`Invalid tool parameter "${token}". Use key=value.`);
    }
    const key = token.slice(0, separator).trim();
    const raw = token.slice(separator + 1).trim();
    if (raw === 'true' || raw === 'false') {
      parameters[key] = raw === 'true';
    } else if (/^-?\d+(\.\d+)?$/.test(raw)) {
      parameters[key] = Number(raw);
    } else {
      parameters[key] = raw;
    }
  }
  return parameters;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export class ToolInvoker {
  private readonly byName: ReadonlyMap<string, ToolDescriptor>;

  constructor(
    private readonly client: CompletionClient,
    private readonly tools: readonly ToolDescriptor[] = TOOLS,
  ) {
    this.byName = new Map(tools.map((descriptor) => [descriptor.name, descriptor]));
  }

  list(): readonly ToolDescriptor[] {
    return this.tools;
  }

  resolve(toolName: string): ToolDescriptor {
    const descriptor = this.byName.get(normalizeToolName(toolName));
    if (!descriptor) {
      throw new UnknownToolError(
        toolName,
        this.tools.map((candidate) => candidate.name),
      );
    }
    return descriptor;
  }

  async invoke(
    toolName: string,
    text: string,
    parameters: ToolParameters = {},
    options: InvokeOptions = {},
  ): Promise<string> {
    const descriptor = this.resolve(toolName);
    const sourceText = text.trim();
    if (!sourceText) {
      throw new ExtractionError('Extracted text is empty; there is nothing to run the tool on.');
    }

    const variables: Record<string, string> = { documentLabel: 'academic document', ...descriptor.defaults };
    for (const [key, value] of Object.entries(parameters)) {
      variables[key] = String(value);
    }

    console.log(`[tools] running ${descriptor.name}`);
    return this.client.complete(descriptor.promptTemplateId, sourceText, {
      variables,
      signal: options.signal,
      label: `tool:${descriptor.name}`,
    });
  }
}
