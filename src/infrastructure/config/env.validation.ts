import { z } from 'zod';

const numberFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive());

/**
 * Environment variables schema using Zod.
 *
 * This schema validates and transforms environment variables at startup,
 * ensuring all required values are present and correctly typed.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // MongoDB
  MONGO_URI: z.url({ message: 'MONGO_URI must be a valid URL' }),

  // Authentication
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_EXPIRES_IN_SECONDS: numberFromEnv('86400'),

  // Rate limiting
  THROTTLE_TTL_MS: numberFromEnv('60000'),
  THROTTLE_LIMIT: numberFromEnv('100'),

  // Seeding (optional admin account)
  ADMIN_EMAIL: z.email({ message: 'ADMIN_EMAIL must be a valid e-mail address' }).optional(),
  ADMIN_PASSWORD: z.string().min(8, 'ADMIN_PASSWORD must be at least 8 characters').optional(),
});

/**
 * Inferred TypeScript type from the env schema.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 * Used by NestJS ConfigModule.forRoot() at application startup.
 *
 * @throws Error listing every invalid variable
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
