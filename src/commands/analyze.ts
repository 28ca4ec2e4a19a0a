import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { isDocumentType } from '../analysis/registry.js';
import { loadConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { openReportArchive } from '../report/archive.js';
import { formatReportSummary, renderReportMarkdown } from '../report/markdown.js';
import { createRuntime } from '../runtime.js';
import { DOCUMENT_TYPES, type DocumentType } from '../types.js';
import { interruptSignal, loadDocument, reportCommandError } from './shared.js';

interface AnalyzeCommandOptions {
  type?: string;
  exclude: string[];
  output?: string;
  archive?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(',').map((item) => item.trim()).filter(Boolean)];
}

function parseDocumentType(value: string | undefined): DocumentType | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (!isDocumentType(normalized)) {
    throw new ConfigurationError(`Unknown document type "${value}". Expected one of: ${DOCUMENT_TYPES.join(', ')}`);
  }
  return normalized;
}

export function analyzeCommand(): Command {
  const command = new Command('analyze');

  command
    .description('Run the full section analysis for a document')
    .argument('<file>', 'PDF, DOCX, TXT or MD file')
    .option('-t, --type <documentType>', `Skip classification (${DOCUMENT_TYPES.join(', ')})`)
    .option('-x, --exclude <sections>', 'Optional sections to leave out (repeatable, comma separated)', collect, [])
    .option('-o, --output <file>', 'Write the Markdown report here instead of stdout')
    .option('--archive', 'Also save the report into REPORTS_DIR')
    .action(async (file: string, options: AnalyzeCommandOptions) => {
      const interrupt = interruptSignal();
      try {
        const documentType = parseDocumentType(options.type);
        const config = loadConfig();
        const { fileName, text } = await loadDocument(file);
        const runtime = createRuntime(config);

        const report = await runtime.orchestrator.analyze(text, {
          documentType,
          exclude: options.exclude,
          signal: interrupt.signal,
          onTaskSettled: (task, index, total) => {
            console.log(`[lectern] ${index + 1}/${total} ${task.descriptor.name}: ${task.status}`);
          },
        });

        const markdown = renderReportMarkdown(report, { sourceName: fileName });
        if (options.output) {
          const outputPath = path.resolve(process.cwd(), options.output);
          await writeFile(outputPath, markdown, 'utf-8');
          console.log(`[lectern] report written to ${outputPath}`);
        } else {
          process.stdout.write(markdown);
        }

        if (options.archive) {
          const archive = await openReportArchive({
            reportsDir: config.reportsDir,
            gitCommit: config.reportsGitCommit,
          });
          await archive.save(report, fileName);
        }

        console.error(formatReportSummary(report));
        if (report.overallStatus === 'total_failure') {
          process.exitCode = 1;
        }
      } catch (error) {
        reportCommandError(error);
      } finally {
        interrupt.dispose();
      }
    });

  return command;
}
