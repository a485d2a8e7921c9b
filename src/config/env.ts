import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  // Server
  PORT: positiveInt.default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter(Boolean)),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_TO_FILE: booleanString,

  // Security tokens
  AGENT_JWT_SECRET: z.string().min(16),
  AGENT_JWT_ISSUER: z.string().min(1).default('agent-guidance-router'),
  AGENT_JWT_EXPIRES_IN_SECONDS: positiveInt.default(3600),
  AGENT_TOKEN_CACHE_SIZE: positiveInt.default(1000),

  // Routing
  AGENT_DISCOVERY_TIMEOUT_MS: positiveInt.default(5000),
  AGENT_SESSION_TIMEOUT_MINUTES: positiveInt.default(30),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
    }
    process.exit(1);
  }
}

export const env = validateEnv();
