import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OLLAMA_URL: z.string().url().default('http://127.0.0.1:11434/api/generate'),
  OLLAMA_MODEL: z.string().min(1).default('gemma3:1b'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  LLM_MAX_COMMENTARY_CHARS: z.coerce.number().int().positive().default(1200),
  EMBEDDING_BASE_URL: z.string().url().default('http://127.0.0.1:11434/v1'),
  EMBEDDING_MODEL: z.string().min(1).default('all-minilm'),
  EMBEDDING_API_KEY: z.string().min(1).default('ollama'),
  EMBEDDING_DIM: z.coerce.number().int().positive().default(384),
  VECTOR_STORE_DIR: z.string().min(1).default('storage/vectors'),
  LOG_DIR: z.string().min(1).default('storage'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export interface AppConfig {
  port: number;
  llm: {
    url: string;
    model: string;
    temperature: number;
    timeoutMs: number;
    maxCommentaryChars: number;
  };
  embedding: {
    baseURL: string;
    model: string;
    apiKey: string;
    dimension: number;
  };
  vectorStoreDir: string;
  log: {
    dir: string;
    level: 'error' | 'warn' | 'info' | 'debug';
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the application config from environment variables.
 * Unset variables fall back to the local model-server defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    llm: {
      url: e.OLLAMA_URL,
      model: e.OLLAMA_MODEL,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxCommentaryChars: e.LLM_MAX_COMMENTARY_CHARS,
    },
    embedding: {
      baseURL: e.EMBEDDING_BASE_URL,
      model: e.EMBEDDING_MODEL,
      apiKey: e.EMBEDDING_API_KEY,
      dimension: e.EMBEDDING_DIM,
    },
    vectorStoreDir: e.VECTOR_STORE_DIR,
    log: {
      dir: e.LOG_DIR,
      level: e.LOG_LEVEL,
    },
  };
}
