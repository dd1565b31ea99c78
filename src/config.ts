/**
 * Environment configuration
 */

import { z } from 'zod';

import { ConfigError } from './utils/errors.js';
import { DEFAULT_LEDGER_API_URL } from './utils/ledger-client.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const booleanFlag = (fallback: boolean) =>
  optionalString.transform((value, ctx) => {
    if (value === undefined) return fallback;
    if (/^(true|1|yes|on)$/i.test(value)) return true;
    if (/^(false|0|no|off)$/i.test(value)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const positiveInt = (fallback?: number) =>
  optionalString.transform((value, ctx) => {
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a positive integer, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is required' }).trim().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: optionalString,
  EXPENSE_CLARITY_CHECK: booleanFlag(true),
  SPLITWISE_API_URL: optionalString,
  IDENTITY_FILE: optionalString,
  AUTH_START_URL: optionalString,
  MEMORY_API_URL: optionalString,
  MEMORY_API_KEY: optionalString,
  MEMORY_SEARCH_LIMIT: positiveInt(5),
  DEFAULT_CURRENCY: optionalString.refine((value) => value === undefined || /^[A-Za-z]{3}$/.test(value), {
    message: 'DEFAULT_CURRENCY must be a three-letter currency code',
  }),
  API_PORT: positiveInt(),
  XMTP_ENV: z.enum(['dev', 'production', 'local']).default('dev'),
  AGENT_TRIGGER: optionalString,
});

export interface AppConfig {
  openaiApiKey: string;
  openaiModel: string;
  clarityCheck: boolean;
  ledgerApiUrl: string;
  identityFile: string;
  authStartUrl: string | undefined;
  memoryApiUrl: string | undefined;
  memoryApiKey: string | undefined;
  memorySearchLimit: number;
  defaultCurrency: string;
  apiPort: number | undefined;
  xmtpEnv: 'dev' | 'production' | 'local';
  agentTrigger: string;
}

/**
 * Reads and validates the agent configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL ?? 'gpt-4o-mini',
    clarityCheck: values.EXPENSE_CLARITY_CHECK,
    ledgerApiUrl: values.SPLITWISE_API_URL ?? DEFAULT_LEDGER_API_URL,
    identityFile: values.IDENTITY_FILE ?? 'user_tokens.json',
    authStartUrl: values.AUTH_START_URL,
    memoryApiUrl: values.MEMORY_API_URL,
    memoryApiKey: values.MEMORY_API_KEY,
    memorySearchLimit: values.MEMORY_SEARCH_LIMIT ?? 5,
    defaultCurrency: (values.DEFAULT_CURRENCY ?? 'INR').toUpperCase(),
    apiPort: values.API_PORT,
    xmtpEnv: values.XMTP_ENV,
    agentTrigger: (values.AGENT_TRIGGER ?? '@splitchat').toLowerCase(),
  };
}
