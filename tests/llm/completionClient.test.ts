/**
 * @file completionClient.test.ts
 * @description Unit tests for the completion client - retries, backoff, timeouts, cancellation, response validation
 * @depends vitest, ai, src/llm/completionClient, tests/helpers/fakes
 */

import { APICallError } from 'ai';
import { describe, expect, it } from 'vitest';
import { CancelledError, CompletionError, ConfigurationError } from '../../src/errors.js';
import { classifyProviderError, truncateSource, type CompletionPhase } from '../../src/llm/completionClient.js';
import { createHarness, markerTemplates } from '../helpers/fakes.js';

const prompts = markerTemplates(['section.summary']);

function apiError(statusCode: number, message = `HTTP ${statusCode}`): APICallError {
  return new APICallError({
    message,
    url: 'https://llm.test/v1/generate',
    requestBodyValues: {},
    statusCode,
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('truncateSource', () => {
  it('leaves short text alone', () => {
    expect(truncateSource('short', 10)).toBe('short');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncateSource('abcdefghijklmnop', 10)).toBe('abcdefghij\n\n[Document truncated]');
  });
});

describe('classifyProviderError', () => {
  it('treats HTTP 429 as rate limiting', () => {
    expect(classifyProviderError(apiError(429))).toEqual({
      kind: 'rate_limited',
      retryable: true,
      message: 'HTTP 429',
      statusCode: 429,
    });
  });

  it('recognises quota messages on other status codes', () => {
    expect(classifyProviderError(apiError(503, 'Quota exceeded for model')).kind).toBe('rate_limited');
  });

  it('keeps the SDK retryability of other API errors', () => {
    expect(classifyProviderError(apiError(400, 'Bad request'))).toEqual({
      kind: 'provider_error',
      retryable: false,
      message: 'Bad request',
      statusCode: 400,
    });
    expect(classifyProviderError(apiError(500, 'Internal error')).retryable).toBe(true);
  });

  it('maps timeout errors and throttling messages from plain errors', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(classifyProviderError(timeout).kind).toBe('timeout');
    expect(classifyProviderError(new Error('RESOURCE_EXHAUSTED')).kind).toBe('rate_limited');
    expect(classifyProviderError(new Error('socket hang up'))).toEqual({
      kind: 'provider_error',
      retryable: true,
      message: 'socket hang up',
    });
  });
});

describe('CompletionClient', () => {
  describe('complete', () => {
    it('renders the template and returns the trimmed answer', async () => {
      const { client, provider } = createHarness({ prompts, responder: () => '  A short summary.  \n' });

      const result = await client.complete('section.summary', 'Some text', {
        variables: { documentLabel: 'research paper' },
      });

      expect(result).toBe('A short summary.');
      expect(provider.requests).toHaveLength(1);
      expect(provider.requests[0].prompt).toBe('[section.summary] research paper: Some text');
      expect(provider.requests[0].system).toBe('test system prompt');
    });

    it('truncates the source text before rendering', async () => {
      const { client, provider } = createHarness({ prompts, client: { maxSourceChars: 10 } });

      await client.complete('section.summary', 'abcdefghijklmnop', { variables: { documentLabel: 'essay' } });

      expect(provider.requests[0].prompt).toBe('[section.summary] essay: abcdefghij\n\n[Document truncated]');
    });

    it('retries rate-limited attempts with exponential backoff', async () => {
      const { client, provider, clock, limiter } = createHarness({
        prompts,
        responder: (_request, call) => {
          if (call < 3) throw apiError(429, 'Too Many Requests');
          return 'done';
        },
      });

      const result = await client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } });

      expect(result).toBe('done');
      expect(provider.calls).toBe(3);
      expect(clock.sleeps).toEqual([2000, 4000]);
      expect(limiter.snapshot()).toMatchObject({ requestCountInWindow: 3, consecutiveFailureCount: 0 });
    });

    it('fails with rate_limited after exhausting retries', async () => {
      const { client, provider, clock, limiter } = createHarness({
        prompts,
        responder: () => {
          throw apiError(429, 'Too Many Requests');
        },
      });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toBeInstanceOf(CompletionError);
      expect(error).toMatchObject({ kind: 'rate_limited', info: { attempts: 4, statusCode: 429 } });
      expect(provider.calls).toBe(4);
      expect(clock.sleeps).toEqual([2000, 4000, 8000]);
      expect(limiter.snapshot().consecutiveFailureCount).toBe(1);
    });

    it('does not retry errors the SDK marks as permanent', async () => {
      const { client, provider, clock } = createHarness({
        prompts,
        responder: () => {
          throw apiError(400, 'Bad request');
        },
      });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toMatchObject({ kind: 'provider_error', message: 'Bad request', info: { attempts: 1 } });
      expect(provider.calls).toBe(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('retries unknown provider failures up to maxRetries', async () => {
      const { client, provider, clock } = createHarness({
        prompts,
        client: { maxRetries: 1 },
        responder: () => {
          throw new Error('socket hang up');
        },
      });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toMatchObject({ kind: 'provider_error', info: { attempts: 2 } });
      expect(provider.calls).toBe(2);
      expect(clock.sleeps).toEqual([2000]);
    });

    it('rejects empty answers as invalid_response without retrying', async () => {
      const { client, provider } = createHarness({ prompts, responder: () => '   ' });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toMatchObject({ kind: 'invalid_response', message: 'Provider returned an empty response' });
      expect(provider.calls).toBe(1);
    });

    it('rejects answers that echo a provider error', async () => {
      const { client } = createHarness({ prompts, responder: () => 'Error: upstream unavailable' });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toMatchObject({
        kind: 'invalid_response',
        message: 'Provider echoed an error: Error: upstream unavailable',
      });
    });

    it('rejects status lines and JSON error bodies', async () => {
      const { client } = createHarness({
        prompts,
        responder: (_request, call) => (call === 1 ? 'Error: 503 Service Unavailable' : '{"error": {"code": 500}}'),
      });
      const run = () => client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } });

      await expect(run()).rejects.toMatchObject({ kind: 'invalid_response' });
      await expect(run()).rejects.toMatchObject({
        kind: 'invalid_response',
        message: 'Provider echoed an error: {"error": {"code": 500}}',
      });
    });

    it('accepts answers that merely start with the word error', async () => {
      const answers = [
        'Error-correcting codes are the subject of this paper.',
        'Error analysis: the authors compare measurement noise across sites.',
      ];
      const { client } = createHarness({ prompts, responder: (_request, call) => answers[call - 1] });
      const run = () => client.complete('section.summary', 'text', { variables: { documentLabel: 'research paper' } });

      await expect(run()).resolves.toBe(answers[0]);
      await expect(run()).resolves.toBe(answers[1]);
    });

    it('fails with timeout when the provider does not answer in time', async () => {
      const { client } = createHarness({
        prompts,
        client: { maxRetries: 0, requestTimeoutMs: 20 },
        responder: () => new Promise<string>(() => {}),
      });

      const error = await captureError(
        client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } }),
      );

      expect(error).toBeInstanceOf(CompletionError);
      expect(error).toMatchObject({ kind: 'timeout', message: 'Request timed out after 20ms' });
    });

    it('raises CancelledError when the caller aborts mid-request', async () => {
      const controller = new AbortController();
      const { client, limiter } = createHarness({
        prompts,
        responder: () => {
          controller.abort();
          return new Promise<string>(() => {});
        },
      });

      const error = await captureError(
        client.complete('section.summary', 'text', {
          variables: { documentLabel: 'essay' },
          signal: controller.signal,
        }),
      );

      expect(error).toBeInstanceOf(CancelledError);
      expect(limiter.snapshot().consecutiveFailureCount).toBe(0);
    });

    it('makes no request when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { client, provider, limiter } = createHarness({ prompts });

      const error = await captureError(
        client.complete('section.summary', 'text', {
          variables: { documentLabel: 'essay' },
          signal: controller.signal,
        }),
      );

      expect(error).toBeInstanceOf(CancelledError);
      expect(provider.calls).toBe(0);
      expect(limiter.snapshot().requestCountInWindow).toBe(0);
    });

    it('reports template problems as ConfigurationError without using a slot', async () => {
      const { client, provider, limiter } = createHarness({ prompts });

      const unknown = await captureError(client.complete('section.missing', 'text'));
      const missingVariable = await captureError(client.complete('section.summary', 'text'));

      expect(unknown).toBeInstanceOf(ConfigurationError);
      expect(missingVariable).toMatchObject({
        message: 'Prompt template "section.summary" is missing variables: documentLabel',
      });
      expect(provider.calls).toBe(0);
      expect(limiter.snapshot().requestCountInWindow).toBe(0);
    });

    it('pauses after three consecutive failed calls', async () => {
      const { client, clock } = createHarness({
        prompts,
        client: { maxRetries: 0 },
        responder: (_request, call) => {
          if (call <= 3) throw apiError(400, 'Bad request');
          return 'recovered';
        },
      });
      const run = () => client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } });

      for (let i = 0; i < 3; i += 1) {
        await captureError(run());
      }
      expect(clock.sleeps).toEqual([]);

      await expect(run()).resolves.toBe('recovered');
      expect(clock.sleeps).toEqual([30_000]);
    });

    it('reports each phase transition', async () => {
      const phases: CompletionPhase[] = [];
      const { client } = createHarness({
        prompts,
        client: { onPhase: (phase) => phases.push(phase) },
        responder: (_request, call) => {
          if (call === 1) throw apiError(429);
          return 'ok';
        },
      });

      await client.complete('section.summary', 'text', { variables: { documentLabel: 'essay' } });

      expect(phases).toEqual(['idle', 'waiting', 'attempting', 'backoff', 'waiting', 'attempting', 'succeeded']);
    });
  });

  describe('backoffDelay', () => {
    it('doubles per attempt and caps at maxBackoffMs', () => {
      const { client } = createHarness({ prompts });

      expect(client.backoffDelay(0)).toBe(2000);
      expect(client.backoffDelay(3)).toBe(16_000);
      expect(client.backoffDelay(6)).toBe(40_000);
    });

    it('applies jitter down to half the delay', () => {
      const { client } = createHarness({ prompts, client: { random: () => 0 } });

      expect(client.backoffDelay(0)).toBe(1000);
      expect(client.backoffDelay(6)).toBe(20_000);
    });
  });
});
