import { simpleGit, type SimpleGit } from 'simple-git';
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { Report } from '../types.js';
import { renderReportMarkdown } from './markdown.js';

export interface ReportArchive {
  save(report: Report, sourceName: string): Promise<string>;
  getLocalPath(): string;
}

export interface ReportArchiveOptions {
  reportsDir: string;
  gitCommit: boolean;
}

function slugify(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60);
}

export function buildReportPath(report: Pick<Report, 'id' | 'documentType' | 'completedAt'>, sourceName: string): string {
  const date = report.completedAt.slice(0, 10);
  const slug = slugify(sourceName.replace(/\.[^.]+$/, '')) || 'document';
  return `${report.documentType}/${date}-${slug}-${report.id.slice(0, 8)}.md`;
}

export async function openReportArchive(options: ReportArchiveOptions): Promise<ReportArchive> {
  const localPath = resolve(options.reportsDir);

  let queue: Promise<void> = Promise.resolve();
  function enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const task = queue.then(fn);
    queue = task.then(
      () => {},
      () => {},
    );
    return task;
  }

  let git: SimpleGit | null = null;

  async function ensureArchive(): Promise<void> {
    return enqueue(async () => {
      await mkdir(localPath, { recursive: true });
      if (!options.gitCommit) return;

      git = simpleGit(localPath);
      if (!existsSync(join(localPath, '.git'))) {
        await git.init();
        console.log(`[archive] initialized git repository at ${localPath}`);
      }
      await git.addConfig('user.email', 'lectern@localhost');
      await git.addConfig('user.name', 'Lectern');
    });
  }

  async function save(report: Report, sourceName: string): Promise<string> {
    return enqueue(async () => {
      const relativePath = buildReportPath(report, sourceName);
      const fullPath = join(localPath, relativePath);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, renderReportMarkdown(report, { sourceName }), 'utf-8');

      if (git) {
        await git.add(relativePath);
        await git.commit(`Add ${report.documentType} report for ${sourceName} (${report.overallStatus})`);
      }

      console.log(`[archive] saved ${relativePath}`);
      return relativePath;
    });
  }

  await ensureArchive();

  return {
    save,
    getLocalPath: () => localPath,
  };
}
