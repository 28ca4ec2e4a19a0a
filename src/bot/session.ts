import type { Report } from '../types.js';

export interface StoredDocument {
  fileName: string;
  text: string;
  receivedAt: string;
}

export interface RunningJob {
  kind: 'analysis' | 'retry' | 'tool';
  label: string;
  controller: AbortController;
  startedAt: string;
  completed: number;
  total: number;
}

export interface ChatSession {
  document?: StoredDocument;
  lastReport?: Report;
  running?: RunningJob;
}

/** Per-chat state kept in memory. Lost on restart; reports survive in the archive. */
export class ChatSessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  get(chatId: string | number): ChatSession {
    const key = String(chatId);
    let session = this.sessions.get(key);
    if (!session) {
      session = {};
      this.sessions.set(key, session);
    }
    return session;
  }

  setDocument(chatId: string | number, document: StoredDocument): void {
    const session = this.get(chatId);
    session.document = document;
    session.lastReport = undefined;
  }

  /** Marks a job as running. Returns null if the chat already has one. */
  startJob(chatId: string | number, job: Omit<RunningJob, 'controller' | 'startedAt' | 'completed'>): RunningJob | null {
    const session = this.get(chatId);
    if (session.running) return null;

    const running: RunningJob = {
      ...job,
      controller: new AbortController(),
      startedAt: new Date().toISOString(),
      completed: 0,
    };
    session.running = running;
    return running;
  }

  finishJob(chatId: string | number, job: RunningJob): void {
    const session = this.get(chatId);
    if (session.running === job) {
      session.running = undefined;
    }
  }

  /** Returns false when nothing was running. */
  cancel(chatId: string | number): boolean {
    const running = this.get(chatId).running;
    if (!running || running.controller.signal.aborted) return false;
    running.controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const session of this.sessions.values()) {
      session.running?.controller.abort();
    }
  }
}
