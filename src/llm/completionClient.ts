import { APICallError } from 'ai';
import {
  CancelledError,
  CompletionError,
  ConfigurationError,
  throwIfCancelled,
  toErrorMessage,
  type CompletionErrorKind,
} from '../errors.js';
import type { PromptRenderer, PromptVariables } from './prompts.js';
import type { CompletionProvider } from './provider.js';
import { systemClock, type Clock, type RateLimiter } from './rateLimit.js';

export type CompletionPhase = 'idle' | 'waiting' | 'attempting' | 'backoff' | 'succeeded' | 'failed';

export interface PhaseDetail {
  label: string;
  attempt: number;
  delayMs?: number;
  errorKind?: CompletionErrorKind;
}

export interface CompletionClientOptions {
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  requestTimeoutMs: number;
  maxSourceChars: number;
  random?: () => number;
  onPhase?: (phase: CompletionPhase, detail: PhaseDetail) => void;
}

export interface CompletionClientDependencies {
  provider: CompletionProvider;
  prompts: PromptRenderer;
  limiter: RateLimiter;
  clock?: Clock;
}

export interface CompleteOptions {
  variables?: PromptVariables;
  signal?: AbortSignal;
  label?: string;
}

interface AttemptFailure {
  kind: CompletionErrorKind;
  retryable: boolean;
  message: string;
  statusCode?: number;
}

type AttemptOutcome = { ok: true; text: string } | { ok: false; failure: AttemptFailure };

const THROTTLE_PATTERN = /\b429\b|quota|rate[ -]?limit|too many requests|resource[ _]exhausted/i;
// `Error: 503 ...`, `Error: service unavailable`, or a JSON error body.
const ERROR_ECHO_PATTERN =
  /^(?:error\s*:\s*(?:\d{3}\b|[\w ]*?\b(?:error|exception|failed|failure|unavailable|denied|invalid|not found|timed? ?out|overloaded)\b)|\{\s*"error"\s*:)/i;
const TRUNCATION_MARKER = '\n\n[Document truncated]';

export function truncateSource(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}${TRUNCATION_MARKER}`;
}

export function classifyProviderError(error: unknown): AttemptFailure {
  const message = toErrorMessage(error);

  if (APICallError.isInstance(error)) {
    if (error.statusCode === 429 || THROTTLE_PATTERN.test(message)) {
      return { kind: 'rate_limited', retryable: true, message, statusCode: error.statusCode };
    }
    return { kind: 'provider_error', retryable: error.isRetryable, message, statusCode: error.statusCode };
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'timeout', retryable: true, message };
  }

  if (THROTTLE_PATTERN.test(message)) {
    return { kind: 'rate_limited', retryable: true, message };
  }

  return { kind: 'provider_error', retryable: true, message };
}

function validateResponse(text: string): AttemptOutcome {
  const trimmed = text.trim();
  if (!trimmed) {
    return {
      ok: false,
      failure: { kind: 'invalid_response', retryable: false, message: 'Provider returned an empty response' },
    };
  }
  if (ERROR_ECHO_PATTERN.test(trimmed)) {
    const preview = trimmed.length > 120 ? `${trimmed.slice(0, 117)}...` : trimmed;
    return {
      ok: false,
      failure: { kind: 'invalid_response', retryable: false, message: `Provider echoed an error: ${preview}` },
    };
  }
  return { ok: true, text: trimmed };
}

function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * One prompt, one answer. Each call moves through
 * idle → waiting → attempting → (backoff → waiting → attempting)* → succeeded | failed.
 */
export class CompletionClient {
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly deps: CompletionClientDependencies,
    private readonly options: CompletionClientOptions,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  get modelId(): string {
    return this.deps.provider.modelId;
  }

  async complete(promptTemplateId: string, sourceText: string, options: CompleteOptions = {}): Promise<string> {
    const label = options.label ?? promptTemplateId;
    const { signal } = options;

    this.transition('idle', { label, attempt: 0 });
    const prompt = this.render(promptTemplateId, sourceText, options.variables);

    for (let attempt = 0; ; attempt += 1) {
      throwIfCancelled(signal);
      this.transition('waiting', { label, attempt });
      await this.deps.limiter.acquire(signal);

      this.transition('attempting', { label, attempt });
      const outcome = await this.attempt(prompt, signal);

      if (outcome.ok) {
        this.deps.limiter.recordSuccess();
        if (attempt > 0) {
          console.log(`[completion] ${label} succeeded on attempt ${attempt + 1}`);
        }
        this.transition('succeeded', { label, attempt });
        return outcome.text;
      }

      const { failure } = outcome;
      if (failure.retryable && attempt < this.options.maxRetries) {
        const delayMs = this.backoffDelay(attempt);
        console.warn(
          `[completion] ${label} ${failure.kind} (attempt ${attempt + 1}/${this.options.maxRetries + 1}): ${failure.message}. Retrying in ${delayMs}ms...`,
        );
        this.transition('backoff', { label, attempt, delayMs, errorKind: failure.kind });
        await this.clock.sleep(delayMs, signal);
        continue;
      }

      this.deps.limiter.recordFailure();
      this.transition('failed', { label, attempt, errorKind: failure.kind });
      console.error(`[completion] ${label} failed after ${attempt + 1} attempt(s): ${failure.kind}: ${failure.message}`);
      throw new CompletionError(failure.kind, failure.message, {
        message: failure.message,
        statusCode: failure.statusCode,
        attempts: attempt + 1,
        retryable: failure.retryable,
      });
    }
  }

  backoffDelay(attempt: number): number {
    const capped = Math.min(this.options.maxBackoffMs, this.options.baseBackoffMs * 2 ** attempt);
    return Math.round(capped * (0.5 + this.random() * 0.5));
  }

  private render(templateId: string, sourceText: string, variables: PromptVariables = {}): string {
    const text = truncateSource(sourceText, this.options.maxSourceChars);
    try {
      return this.deps.prompts.render(templateId, { ...variables, text });
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Failed to render prompt template "${templateId}": ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async attempt(prompt: string, signal: AbortSignal | undefined): Promise<AttemptOutcome> {
    const timeoutSignal = AbortSignal.timeout(this.options.requestTimeoutMs);
    const abortSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    try {
      const text = await abandonOnAbort(
        this.deps.provider.generate({ system: this.deps.prompts.system, prompt, abortSignal }),
        abortSignal,
      );
      return validateResponse(text);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (timeoutSignal.aborted) {
        return {
          ok: false,
          failure: {
            kind: 'timeout',
            retryable: true,
            message: `Request timed out after ${this.options.requestTimeoutMs}ms`,
          },
        };
      }
      return { ok: false, failure: classifyProviderError(error) };
    }
  }

  private transition(phase: CompletionPhase, detail: PhaseDetail): void {
    this.options.onPhase?.(phase, detail);
  }
}
