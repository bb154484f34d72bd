// Zod provides runtime validation for environment variables.
import { z } from 'zod';

// Numeric settings arrive as strings; reject anything that is not a positive integer.
const positiveInt = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform(Number)
    .refine(n => n > 0, 'must be a positive integer')
    .default(String(fallback));

const EnvSchema = z.object({
  PORT: positiveInt(8085),
  HOST: z.string().min(1).default('0.0.0.0'),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGODB_DB: z.string().min(1).default('storefront'),
  STORE_TIMEOUT_MS: positiveInt(5000),
  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(1).default('admin'),
  AUTH_COOKIE_NAME: z.string().min(1).default('auth_token'),
  SESSION_SWEEP_INTERVAL_MS: positiveInt(60 * 60 * 1000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

// Inferred type keeps TS in sync with the runtime schema.
export type Env = z.infer<typeof EnvSchema>;
// Parse process.env once and export a typed, validated config object.
export const env: Env = EnvSchema.parse(process.env);

// True when the operator account still uses the built-in credentials.
export function usingDefaultAdminCredentials(): boolean {
  return env.ADMIN_USERNAME === 'admin' && env.ADMIN_PASSWORD === 'admin';
}
