import { z } from 'zod';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['', '0', 'false', 'no', 'off']);

const booleanFlag = z
  .string()
  .optional()
  .refine(
    value => value === undefined || TRUTHY.has(value.toLowerCase()) || FALSY.has(value.toLowerCase()),
    'expected a boolean flag'
  )
  .transform(value => value !== undefined && TRUTHY.has(value.toLowerCase()));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  SHELLPILOT_API_KEY: optionalString,
  SHELLPILOT_SESSION_ID: z.string().min(1).default('default'),
  SHELLPILOT_STORE: z.enum(['sqlite', 'memory']).default('sqlite'),
  SHELLPILOT_DB_PATH: z.string().min(1).default('data/shellpilot.db'),
  SHELLPILOT_AUDIT: z.enum(['console', 'sqlite']).default('console'),
  SHELLPILOT_SHELL: z.string().min(1).default('/bin/sh'),
  SHELLPILOT_AUTO_RESPOND: booleanFlag,
  SHELLPILOT_MAX_ESCALATION_DEPTH: positiveInt(10),
  SHELLPILOT_ACTION_DELAY_MS: nonNegativeInt(500),
  SHELLPILOT_SETTLE_DELAY_MS: nonNegativeInt(1000),
  SHELLPILOT_QUIESCENCE_MS: positiveInt(2000),
  SHELLPILOT_MAX_CAPTURE_MS: positiveInt(30_000),
  SHELLPILOT_PROGRESS_POLL_MS: positiveInt(2000),
  SHELLPILOT_PROGRESS_CEILING_MS: positiveInt(300_000),
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: optionalString,
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini')
});

export interface ShellpilotConfig {
  port: number;
  apiKey?: string;
  sessionId: string;
  store: 'sqlite' | 'memory';
  dbPath: string;
  audit: 'console' | 'sqlite';
  shell: string;
  autoRespond: boolean;
  maxEscalationDepth: number;
  actionDelayMs: number;
  settleDelayMs: number;
  quiescenceMs: number;
  maxCaptureMs: number;
  progressPollMs: number;
  progressCeilingMs: number;
  llm: {
    apiKey?: string;
    baseURL?: string;
    model: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads configuration from environment variables. Call `dotenv.config()`
 * first when a .env file should be honored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShellpilotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    apiKey: e.SHELLPILOT_API_KEY,
    sessionId: e.SHELLPILOT_SESSION_ID,
    store: e.SHELLPILOT_STORE,
    dbPath: e.SHELLPILOT_DB_PATH,
    audit: e.SHELLPILOT_AUDIT,
    shell: e.SHELLPILOT_SHELL,
    autoRespond: e.SHELLPILOT_AUTO_RESPOND,
    maxEscalationDepth: e.SHELLPILOT_MAX_ESCALATION_DEPTH,
    actionDelayMs: e.SHELLPILOT_ACTION_DELAY_MS,
    settleDelayMs: e.SHELLPILOT_SETTLE_DELAY_MS,
    quiescenceMs: e.SHELLPILOT_QUIESCENCE_MS,
    maxCaptureMs: e.SHELLPILOT_MAX_CAPTURE_MS,
    progressPollMs: e.SHELLPILOT_PROGRESS_POLL_MS,
    progressCeilingMs: e.SHELLPILOT_PROGRESS_CEILING_MS,
    llm: {
      apiKey: e.LLM_API_KEY,
      baseURL: e.LLM_BASE_URL,
      model: e.LLM_MODEL
    }
  };
}
