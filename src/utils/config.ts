import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const positiveNumber = (fallback: number) => z.coerce.number().positive().finite().default(fallback);

export const ConfigSchema = z.object({
  title: z.string().min(1).default('Hypothesis Forge'),
  version: z.string().min(1).default('1.0.0'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  transport: z.enum(['stdio', 'http']).default('stdio'),
  maxAgeHours: positiveNumber(24),
  sweepIntervalMinutes: positiveNumber(60),
  storageDir: optionalString,
  auditLogFile: z.string().default('./var/logs/tool_calls.jsonl'),
  llm: z.object({
    apiBaseUrl: z.string().url().default('https://api.openai.com/v1'),
    apiKey: optionalString,
    modelName: z.string().min(1).default('gpt-4.1-nano'),
    temperature: z.coerce.number().min(0).max(2).default(0),
    timeoutMs: positiveNumber(120_000),
  }),
  sandbox: z.object({
    timeoutMs: positiveNumber(10_000),
    memoryMb: positiveNumber(128),
  }),
});

export type HypoForgeConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Build the startup configuration from environment variables.
 * Throws ConfigError when a value is malformed; the server must not boot then.
 */
export function loadConfig(env: Env = process.env): HypoForgeConfig {
  const raw = {
    title: blankToUndefined(env.HYPOFORGE_TITLE),
    version: blankToUndefined(env.HYPOFORGE_VERSION),
    host: blankToUndefined(env.HYPOFORGE_HOST),
    port: blankToUndefined(env.HYPOFORGE_PORT),
    transport: blankToUndefined(env.HYPOFORGE_TRANSPORT),
    maxAgeHours: blankToUndefined(env.HYPOFORGE_MAX_AGE_HOURS),
    sweepIntervalMinutes: blankToUndefined(env.HYPOFORGE_SWEEP_INTERVAL_MINUTES),
    storageDir: env.HYPOFORGE_STORAGE_DIR,
    // an explicitly empty AUDIT_LOG_FILE disables the audit trail
    auditLogFile: env.AUDIT_LOG_FILE,
    llm: {
      apiBaseUrl: blankToUndefined(env.LLM_API_BASE_URL),
      apiKey: env.LLM_API_KEY,
      modelName: blankToUndefined(env.LLM_MODEL_NAME),
      temperature: blankToUndefined(env.LLM_TEMPERATURE),
      timeoutMs: blankToUndefined(env.LLM_TIMEOUT_MS),
    },
    sandbox: {
      timeoutMs: blankToUndefined(env.SANDBOX_TIMEOUT_MS),
      memoryMb: blankToUndefined(env.SANDBOX_MEMORY_MB),
    },
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
