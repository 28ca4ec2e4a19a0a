import { Command } from 'commander';
import { DocumentClassifier } from '../analysis/classifier.js';
import { documentTypeLabel, TaskRegistry } from '../analysis/registry.js';
import { loadDocument, reportCommandError } from './shared.js';

export function classifyCommand(): Command {
  return new Command('classify')
    .description('Show which document type a file is detected as, and why')
    .argument('<file>', 'PDF, DOCX, TXT or MD file')
    .action(async (file: string) => {
      try {
        const { text } = await loadDocument(file);
        const classification = new DocumentClassifier().explain(text);
        const sections = new TaskRegistry().tasksFor(classification.documentType);

        const lines = [
          `Document type: ${documentTypeLabel(classification.documentType)} (confidence ${classification.confidence})`,
          `Scores: ${Object.entries(classification.scores)
            .map(([type, score]) => `${type}=${score}`)
            .join(' ')}`,
        ];
        if (classification.signals.length > 0) {
          lines.push('Signals:');
          lines.push(...classification.signals.map((signal) => `- ${signal}`));
        }
        lines.push(`Sections: ${sections.map((section) => section.name).join(', ')}`);
        console.log(lines.join('\n'));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
