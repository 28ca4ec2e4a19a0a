import { z } from 'zod';

export interface LecternConfig {
  anthropicApiKey?: string;
  googleGenerativeAiApiKey?: string;
  defaultModel: string;
  temperature: number;
  maxTokens: number;
  requestsPerWindow: number;
  windowDurationSeconds: number;
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  requestTimeoutMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerPauseMs: number;
  maxSourceChars: number;
  maxUploadMb: number;
  reportsDir: string;
  reportsGitCommit: boolean;
  telegramBotToken?: string;
  tavilyApiKey?: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const configSchema = z
  .object({
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    GOOGLE_GENERATIVE_AI_API_KEY: z.string().min(1).optional(),
    DEFAULT_MODEL: z.string().default('gemini-2.5-flash'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    REQUESTS_PER_WINDOW: z.coerce.number().int().positive().default(15),
    WINDOW_DURATION_SECONDS: z.coerce.number().positive().default(60),
    MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    BASE_BACKOFF_MS: z.coerce.number().int().nonnegative().default(2000),
    MAX_BACKOFF_MS: z.coerce.number().int().nonnegative().default(40_000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().int().positive().default(3),
    CIRCUIT_BREAKER_PAUSE_MS: z.coerce.number().int().nonnegative().default(30_000),
    MAX_SOURCE_CHARS: z.coerce.number().int().positive().default(12_000),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
    REPORTS_DIR: z.string().min(1).default('reports'),
    REPORTS_GIT_COMMIT: booleanFlag,
    TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
    TAVILY_API_KEY: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    const model = value.DEFAULT_MODEL.trim().toLowerCase();
    if (model.startsWith('claude-') && !value.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'ANTHROPIC_API_KEY is required when DEFAULT_MODEL is a Claude model.',
      });
    }

    if ((model.startsWith('gemini-') || model.startsWith('gemma-')) && !value.GOOGLE_GENERATIVE_AI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_GENERATIVE_AI_API_KEY'],
        message:
          'GOOGLE_GENERATIVE_AI_API_KEY is required when DEFAULT_MODEL is a Gemini/Gemma model.',
      });
    }

    if (value.MAX_BACKOFF_MS < value.BASE_BACKOFF_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MAX_BACKOFF_MS'],
        message: 'MAX_BACKOFF_MS must be greater than or equal to BASE_BACKOFF_MS.',
      });
    }
  });

// Empty assignments in .env files arrive as ''; treat them as unset.
function dropBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || value.trim() === '') continue;
    cleaned[key] = value.trim();
  }
  return cleaned;
}

export function parseConfig(env: NodeJS.ProcessEnv): LecternConfig {
  const parsed = configSchema.parse(dropBlankValues(env));

  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    googleGenerativeAiApiKey: parsed.GOOGLE_GENERATIVE_AI_API_KEY,
    defaultModel: parsed.DEFAULT_MODEL,
    temperature: parsed.LLM_TEMPERATURE,
    maxTokens: parsed.LLM_MAX_TOKENS,
    requestsPerWindow: parsed.REQUESTS_PER_WINDOW,
    windowDurationSeconds: parsed.WINDOW_DURATION_SECONDS,
    maxRetries: parsed.MAX_RETRIES,
    baseBackoffMs: parsed.BASE_BACKOFF_MS,
    maxBackoffMs: parsed.MAX_BACKOFF_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    circuitBreakerThreshold: parsed.CIRCUIT_BREAKER_THRESHOLD,
    circuitBreakerPauseMs: parsed.CIRCUIT_BREAKER_PAUSE_MS,
    maxSourceChars: parsed.MAX_SOURCE_CHARS,
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    reportsDir: parsed.REPORTS_DIR,
    reportsGitCommit: parsed.REPORTS_GIT_COMMIT,
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
    tavilyApiKey: parsed.TAVILY_API_KEY,
  };
}

let _config: LecternConfig | null = null;

export function loadConfig(): LecternConfig {
  if (_config) return _config;
  _config = parseConfig(process.env);
  return _config;
}
