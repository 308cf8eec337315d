import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATA_SOURCE: z.enum(['json', 'postgres']).default('json'),
  DATASET_PATH: z.string().default('data/places.json'),
  DATASET_CACHE_TTL_MS: z.coerce.number().int().min(0).default(10 * 60 * 1000),
  WEEKEND_TOP_N: z.coerce.number().int().min(1).max(50).default(5),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().default(5432),
  POSTGRES_DB: z.string().default('weekend_ranker'),
  POSTGRES_USER: z.string().default('weekend_user'),
  POSTGRES_PASSWORD: z.string().default('dev-password'),
});

type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

export const isDevelopment = env.NODE_ENV === 'development';
