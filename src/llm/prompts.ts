import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, toErrorMessage } from '../errors.js';

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(
  new URL('../../prompts/templates.json', import.meta.url),
);

const templateFileSchema = z.object({
  system: z.string().min(1),
  templates: z.record(z.string().min(1)),
});

export type PromptVariables = Record<string, string>;

export interface PromptRenderer {
  readonly system?: string;
  render(templateId: string, variables: PromptVariables): string;
}

const PLACEHOLDER = /\{\{\s*([a-zA-Z][\w]*)\s*\}\}/g;

export class PromptLibrary implements PromptRenderer {
  private readonly templates: ReadonlyMap<string, string>;

  constructor(
    readonly system: string,
    templates: Record<string, string>,
  ) {
    this.templates = new Map(Object.entries(templates));
  }

  static fromFile(filePath: string = DEFAULT_TEMPLATES_PATH): PromptLibrary {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read prompt templates from ${filePath}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = templateFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid prompt template file ${filePath}: ${parsed.error.message}`);
    }
    return new PromptLibrary(parsed.data.system, parsed.data.templates);
  }

  has(templateId: string): boolean {
    return this.templates.has(templateId);
  }

  ids(): string[] {
    return Array.from(this.templates.keys());
  }

  render(templateId: string, variables: PromptVariables): string {
    const template = this.templates.get(templateId);
    if (template === undefined) {
      throw new ConfigurationError(`Unknown prompt template "${templateId}"`);
    }

    const missing = new Set<string>();
    const rendered = template.replace(PLACEHOLDER, (_match, name: string) => {
      const value = variables[name];
      if (value === undefined) {
        missing.add(name);
        return '';
      }
      return value;
    });

    if (missing.size > 0) {
      throw new ConfigurationError(
        `Prompt template "${templateId}" is missing variables: ${Array.from(missing).join(', ')}`,
      );
    }
    return rendered;
  }
}
