import { z } from 'zod';

const integerString = (name: string, fallback: string, min: number, max: number) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .refine(
      (val) => !isNaN(val) && val >= min && val <= max,
      `${name} must be an integer between ${min} and ${max}`
    );

const emptyAsUndefined = (val: unknown) => (val === '' ? undefined : val);

// Zod schema for environment variables
const EnvSchema = z.object({
  TAIGA_BASE_URL: z.preprocess(
    emptyAsUndefined,
    z.string().url('TAIGA_BASE_URL must be a valid URL').optional()
  ).describe('Taiga API base URL, e.g. https://api.taiga.io/api/v1'),

  TAIGA_USERNAME: z.preprocess(emptyAsUndefined, z.string().optional())
    .describe('Taiga service account username'),

  TAIGA_PASSWORD: z.preprocess(emptyAsUndefined, z.string().optional())
    .describe('Taiga service account password'),

  TAIGA_REQUEST_TIMEOUT_MS: integerString('TAIGA_REQUEST_TIMEOUT_MS', '30000', 1, 120000)
    .describe('Timeout for a single Taiga API call in milliseconds'),

  ACTION_PROXY_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional())
    .describe('Shared secret expected in the X-Api-Key header of /actions requests'),

  IDEMPOTENCY_TTL_SECONDS: integerString('IDEMPOTENCY_TTL_SECONDS', '86400', 1, 7 * 86400)
    .describe('How long a replayable task creation result is kept'),

  IDEMPOTENCY_MAX_ENTRIES: integerString('IDEMPOTENCY_MAX_ENTRIES', '10000', 1, 1000000)
    .describe('Upper bound on cached idempotency entries'),

  PORT: integerString('PORT', '8000', 1, 65535),

  HOST: z.string().optional().default('0.0.0.0'),

  ALLOWED_HOSTS: z
    .string()
    .optional()
    .transform((val) =>
      val ? val.split(',').map((host) => host.trim()).filter((host) => host !== '') : []
    )
    .describe('Host header values accepted by /mcp (empty disables DNS rebinding protection)'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid environment configuration:\n${problems.join('\n')}`);
    this.name = 'ConfigurationError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse({
    TAIGA_BASE_URL: env.TAIGA_BASE_URL,
    TAIGA_USERNAME: env.TAIGA_USERNAME,
    TAIGA_PASSWORD: env.TAIGA_PASSWORD,
    TAIGA_REQUEST_TIMEOUT_MS: env.TAIGA_REQUEST_TIMEOUT_MS,
    ACTION_PROXY_API_KEY: env.ACTION_PROXY_API_KEY,
    IDEMPOTENCY_TTL_SECONDS: env.IDEMPOTENCY_TTL_SECONDS,
    IDEMPOTENCY_MAX_ENTRIES: env.IDEMPOTENCY_MAX_ENTRIES,
    PORT: env.PORT,
    HOST: env.HOST,
    ALLOWED_HOSTS: env.ALLOWED_HOSTS,
  });

  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    );
  }

  return result.data;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Helper function to redact sensitive data in logs
export function redactSecrets(text: string, secrets: readonly string[] = []): string {
  if (!text) return text;

  let redacted = text;
  for (const secret of secrets) {
    if (secret) {
      redacted = redacted.replace(new RegExp(escapeRegExp(secret), 'g'), '***REDACTED***');
    }
  }

  // Bearer tokens are minted per request, so they can't be registered up front
  redacted = redacted.replace(/Bearer\s+[\w\-.]+/gi, 'Bearer ***REDACTED_TOKEN***');

  return redacted;
}
