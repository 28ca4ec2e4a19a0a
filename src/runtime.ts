import { AnalysisOrchestrator } from './analysis/orchestrator.js';
import { ToolInvoker } from './analysis/tools.js';
import type { LecternConfig } from './config.js';
import { CompletionClient } from './llm/completionClient.js';
import { PromptLibrary, type PromptRenderer } from './llm/prompts.js';
import { createLanguageModelProvider, type CompletionProvider } from './llm/provider.js';
import { RateLimiter, type Clock } from './llm/rateLimit.js';

export interface Runtime {
  limiter: RateLimiter;
  client: CompletionClient;
  orchestrator: AnalysisOrchestrator;
  tools: ToolInvoker;
}

export interface RuntimeOverrides {
  provider?: CompletionProvider;
  prompts?: PromptRenderer;
  clock?: Clock;
  random?: () => number;
}

/**
 * Wires the shared rate limiter, completion client, orchestrator and tool invoker.
 * One runtime per process: every analysis and tool call draws on the same request budget.
 */
export function createRuntime(config: LecternConfig, overrides: RuntimeOverrides = {}): Runtime {
  const limiter = new RateLimiter(
    {
      requestsPerWindow: config.requestsPerWindow,
      windowMs: config.windowDurationSeconds * 1000,
      circuitBreakerThreshold: config.circuitBreakerThreshold,
      circuitBreakerPauseMs: config.circuitBreakerPauseMs,
    },
    overrides.clock,
  );

  const client = new CompletionClient(
    {
      provider: overrides.provider ?? createLanguageModelProvider(config),
      prompts: overrides.prompts ?? PromptLibrary.fromFile(),
      limiter,
      clock: overrides.clock,
    },
    {
      maxRetries: config.maxRetries,
      baseBackoffMs: config.baseBackoffMs,
      maxBackoffMs: config.maxBackoffMs,
      requestTimeoutMs: config.requestTimeoutMs,
      maxSourceChars: config.maxSourceChars,
      random: overrides.random,
    },
  );

  return {
    limiter,
    client,
    orchestrator: new AnalysisOrchestrator({ client }),
    tools: new ToolInvoker(client),
  };
}
