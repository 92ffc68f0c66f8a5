import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

// Load .env file
dotenvConfig();

const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default('0.0.0.0'),

  // Wikipedia (MediaWiki Action API)
  WIKIPEDIA_API_URL: z.string().url().default('https://en.wikipedia.org/w/api.php'),
  HTTP_USER_AGENT: z
    .string()
    .min(1)
    .default('infobox-query/1.0 (https://github.com/infobox-query/infobox-query)'),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Query table
  QUERY_TABLE_PATH: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Application
  APP_VERSION: z.string().default('1.0.0'),
  SERVICE_NAME: z.string().default('infobox-query'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment variables');
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}
