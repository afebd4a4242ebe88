import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  MANIFEST_ROOT: z.string().default('.'),
  STATS_URL: z.string().url().optional(),
  HTTP_RETRIES: z.coerce.number().int().min(1).default(3),
  HTTP_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(20000),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
