import { z } from 'zod';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  // Pre-shared key callers present in the X-API-Key header.
  API_KEY: z.string().min(1),
  DATABASE_URL: z.string().min(1),

  PORT: z.coerce.number().int().min(1).max(65535).default(8787),

  // Upper bound for a single probe; a hung endpoint must not stall the batch.
  PROBE_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(10_000),

  ALLOW_PRIVATE_TARGETS: booleanFlagSchema,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const r = envSchema.safeParse(source);
  if (!r.success) {
    throw new Error(`Invalid environment: ${r.error.message}`);
  }
  return r.data;
}
