import { z } from 'zod';

/**
 * Environment variables schema using Zod.
 *
 * Validates and transforms environment variables at startup,
 * so the rest of the CLI can rely on typed, defaulted values.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging (pino levels)
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Café
  CAFE_NAME: z.string().trim().min(1, 'CAFE_NAME cannot be empty').default('Corner Café'),
});

/**
 * Inferred TypeScript type from the env schema.
 * Use this for type-safe access to environment variables.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 *
 * Used by NestJS ConfigModule.forRoot() at startup.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws Error listing every failed variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(
      `\nEnvironment validation failed:\n${errors}\n\nPlease check your .env file or environment variables.`,
    );
  }

  return result.data;
}
