import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  // Directory holding manifest.json and the <year>.json files
  TAX_CONFIG_DIR: z.string().min(1).optional(),
  DEFAULT_LOCALE: z.enum(['en', 'el']).default('en'),
  MAX_DEPENDANTS: z.coerce.number().int().min(0).default(15)
});

export const API_VERSION = '1.0.0';

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${issues}`);
}

export const env: Env = parsed.data;

export function isProduction(): boolean {
  return env.NODE_ENV === 'production';
}
