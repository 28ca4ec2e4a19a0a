import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { extractText } from '../documents/extract.js';
import { isAnalysisError } from '../errors.js';

export interface LoadedDocument {
  fileName: string;
  text: string;
}

export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  const resolved = path.resolve(process.cwd(), filePath);
  const data = await readFile(resolved);
  const fileName = path.basename(resolved);
  const text = await extractText({ fileName, data });
  console.log(`[lectern] extracted ${text.length} characters from ${fileName}`);
  return { fileName, text };
}

/** Aborts the returned signal on the first Ctrl-C; a second one exits. */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.warn('[lectern] cancelling, press Ctrl-C again to quit immediately');
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  return {
    signal: controller.signal,
    dispose: () => process.removeListener('SIGINT', onSigint),
  };
}

/** Prints known errors without a stack and marks the process failed. Unknown errors propagate. */
export function reportCommandError(error: unknown): void {
  if (!isAnalysisError(error)) throw error;

  console.error(`[lectern] ${error.message}`);
  if (error.info.statusCode) {
    console.error(`[lectern] Status: ${error.info.statusCode}`);
  }
  if (error.info.attempts) {
    console.error(`[lectern] Attempts: ${error.info.attempts}`);
  }
  process.exitCode = 1;
}
