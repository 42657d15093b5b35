import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

const EnvSchema = z.object({
  BACKEND_PORT: z.coerce.number().int().positive().default(3001),
  BACKEND_HOST: z.string().min(1).default('127.0.0.1'),
  PUBLIC_BASE_URL: z.string().url().optional(),
  CORS_ORIGINS: commaList,

  CATALOG_DB_PATH: z.string().min(1).default('./storage/db/catalog.sqlite'),
  THUMBNAILS_DIR: z.string().min(1).default('./storage/thumbnails'),

  QDRANT_URL: z.string().url().default('http://127.0.0.1:6333'),
  QDRANT_TEXT_COLLECTION: z.string().min(1).default('file_text'),
  QDRANT_VISUAL_COLLECTION: z.string().min(1).default('file_visual'),

  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_EMBED_MODEL: z.string().min(1).default('all-minilm'),
  CLIP_BASE_URL: z.string().url().default('http://localhost:8090'),
  EMBED_MAX_TEXT_CHARS: z.coerce.number().int().positive().default(8000),
  EMBED_MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  GROQ_API_KEY: z
    .string()
    .min(1, 'GROQ_API_KEY is required')
    .refine((value) => value !== 'your_groq_api_key_here', 'GROQ_API_KEY still holds the placeholder value'),
  GROQ_CHAT_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),

  AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).max(10).default(5),
  AGENT_HISTORY_TURNS: z.coerce.number().int().min(0).max(100).default(10),
  AGENT_TOOL_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
  AGENT_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  AGENT_LOOP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  AGENT_ANSWER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.enum(['true', 'false']).optional(),
  NODE_ENV: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  http: {
    port: number;
    host: string;
    publicBaseUrl: string;
    corsOrigins: string[];
  };
  storage: {
    catalogDbPath: string;
    thumbnailsDir: string;
  };
  qdrant: {
    url: string;
    textCollection: string;
    visualCollection: string;
  };
  embeddings: {
    ollamaBaseUrl: string;
    ollamaModel: string;
    clipBaseUrl: string;
    maxTextChars: number;
    maxImageBytes: number;
    timeoutMs: number;
  };
  groq: {
    apiKey: string;
    chatModel: string;
  };
  agent: {
    maxIterations: number;
    historyTurns: number;
    toolConcurrency: number;
    toolTimeoutMs: number;
    loopTimeoutMs: number;
    answerTimeoutMs: number;
  };
  log: {
    level: Env['LOG_LEVEL'];
    pretty: boolean;
  };
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid environment:\n${msg}`);
  }

  const env = parsed.data;
  const pretty = env.LOG_PRETTY
    ? env.LOG_PRETTY === 'true'
    : env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';

  return {
    http: {
      port: env.BACKEND_PORT,
      host: env.BACKEND_HOST,
      publicBaseUrl: (env.PUBLIC_BASE_URL ?? `http://${env.BACKEND_HOST}:${env.BACKEND_PORT}`).replace(/\/+$/, ''),
      corsOrigins: env.CORS_ORIGINS.length > 0 ? env.CORS_ORIGINS : DEFAULT_CORS_ORIGINS,
    },
    storage: {
      catalogDbPath: env.CATALOG_DB_PATH,
      thumbnailsDir: env.THUMBNAILS_DIR,
    },
    qdrant: {
      url: env.QDRANT_URL,
      textCollection: env.QDRANT_TEXT_COLLECTION,
      visualCollection: env.QDRANT_VISUAL_COLLECTION,
    },
    embeddings: {
      ollamaBaseUrl: env.OLLAMA_BASE_URL.replace(/\/+$/, ''),
      ollamaModel: env.OLLAMA_EMBED_MODEL,
      clipBaseUrl: env.CLIP_BASE_URL.replace(/\/+$/, ''),
      maxTextChars: env.EMBED_MAX_TEXT_CHARS,
      maxImageBytes: env.EMBED_MAX_IMAGE_BYTES,
      timeoutMs: env.EMBED_TIMEOUT_MS,
    },
    groq: {
      apiKey: env.GROQ_API_KEY,
      chatModel: env.GROQ_CHAT_MODEL,
    },
    agent: {
      maxIterations: env.AGENT_MAX_ITERATIONS,
      historyTurns: env.AGENT_HISTORY_TURNS,
      toolConcurrency: env.AGENT_TOOL_CONCURRENCY,
      toolTimeoutMs: env.AGENT_TOOL_TIMEOUT_MS,
      loopTimeoutMs: env.AGENT_LOOP_TIMEOUT_MS,
      answerTimeoutMs: env.AGENT_ANSWER_TIMEOUT_MS,
    },
    log: {
      level: env.LOG_LEVEL,
      pretty,
    },
  };
}
