import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  /** Comma-separated list of allowed CORS origins */
  FRONTEND_URL: z.string().min(1).default('http://localhost:3000'),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().int().min(1).max(200).default(50),
  IMPORT_DECIMAL_SEPARATOR: z.enum([',', '.']).default(','),
  IMPORT_DATE_FORMAT: z.string().min(1).default('dd/MM/yyyy'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
