import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_ORIGIN: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  CATALOG_PATH: z.string().min(1).default('data/songs.json'),
  EMBEDDING_PROVIDER: z.enum(['openai', 'hashing']).default('hashing'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
  EMBED_BATCH_SIZE: z.coerce.number().int().positive().default(16),
  EMBED_CONCURRENCY: z.coerce.number().int().positive().default(4),
  EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  QUERY_DEFAULT_LIMIT: z.coerce.number().int().nonnegative().default(5),
  ADMIN_TOKEN: z.string().min(1).optional(),
}).superRefine((env, ctx) => {
  if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OPENAI_API_KEY'],
      message: 'OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai',
    });
  }
});

export type ServerEnv = z.infer<typeof envSchema>;

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function parseServerEnv(source: NodeJS.ProcessEnv): ServerEnv {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error('Missing/invalid server env: ' + JSON.stringify(error.format()));
    }
    throw error;
  }
}

export function loadServerEnv(): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseServerEnv({ ...process.env });
  return cachedEnv;
}
