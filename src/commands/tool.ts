import { Command } from 'commander';
import { parseToolParameters, TOOLS } from '../analysis/tools.js';
import { loadConfig } from '../config.js';
import { buildLiteratureQuery, formatSearchResults, searchRelatedLiterature } from '../research/search.js';
import { createRuntime } from '../runtime.js';
import { interruptSignal, loadDocument, reportCommandError } from './shared.js';

interface ToolCommandOptions {
  param: string[];
  search?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function toolCommand(): Command {
  const command = new Command('tool');

  command
    .description('Run one research or study tool against a document')
    .argument('<name>', 'Tool name, e.g. flashcards or related-papers')
    .argument('<file>', 'PDF, DOCX, TXT or MD file')
    .option('-p, --param <key=value>', 'Tool parameter (repeatable)', collect, [])
    .option('--search', 'Feed Tavily web search results into related-papers')
    .action(async (name: string, file: string, options: ToolCommandOptions) => {
      const interrupt = interruptSignal();
      try {
        const parameters = parseToolParameters(options.param);
        const config = loadConfig();
        const runtime = createRuntime(config);
        const descriptor = runtime.tools.resolve(name);
        const { text } = await loadDocument(file);

        if (options.search && descriptor.name === 'related-papers') {
          const search = await searchRelatedLiterature(config, buildLiteratureQuery(text));
          parameters.searchResults = formatSearchResults(search);
        }

        const output = await runtime.tools.invoke(descriptor.name, text, parameters, { signal: interrupt.signal });
        process.stdout.write(`# ${descriptor.title}\n\n${output}\n`);
      } catch (error) {
        reportCommandError(error);
      } finally {
        interrupt.dispose();
      }
    });

  return command;
}

export function toolsCommand(): Command {
  return new Command('tools').description('List available tools').action(() => {
    for (const descriptor of TOOLS) {
      const defaults = Object.entries(descriptor.defaults)
        .filter(([key]) => key !== 'searchResults')
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
      console.log(`${descriptor.name.padEnd(20)} ${descriptor.description}${defaults ? ` [${defaults}]` : ''}`);
    }
  });
}
