import { z } from 'zod';
import { parseAllowList } from './access.js';
import type { BotConfig, ReplyMode } from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_ANTHROPIC_TIMEOUT_MS = 30_000;
export const DEFAULT_COMMAND_PREFIX = '!';

/** Default MIN_REPLY_SECONDS per reply mode. */
export const DEFAULT_MIN_REPLY_SECONDS: Record<ReplyMode, number> = {
  generative: 3,
  static: 3600,
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// Blank variables behave as unset
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const nonNegativeInt = (name: string) =>
  optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, `${name} must be a non-negative integer`)
      .transform(Number)
      .optional()
  );

const EnvSchema = z.object({
  DISCORD_BOT_TOKEN: optionalString.pipe(
    z.string({ required_error: 'DISCORD_BOT_TOKEN is required' })
  ),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  ANTHROPIC_TIMEOUT_MS: nonNegativeInt('ANTHROPIC_TIMEOUT_MS'),
  REPLY_MODE: optionalString.pipe(
    z
      .enum(['generative', 'static'], {
        errorMap: () => ({ message: "REPLY_MODE must be 'generative' or 'static'" }),
      })
      .default('generative')
  ),
  ALLOWED_USER_IDS: optionalString,
  MIN_REPLY_SECONDS: nonNegativeInt('MIN_REPLY_SECONDS'),
  CHANNEL_ID: optionalString,
  COMMAND_PREFIX: optionalString,
  PERSONA_FILE: optionalString,
});

// Parsed on its own so a missing key is reported even when EnvSchema fails
const CredentialsSchema = z
  .object({
    REPLY_MODE: optionalString,
    ANTHROPIC_API_KEY: optionalString,
  })
  .superRefine((env, ctx) => {
    if ((env.REPLY_MODE ?? 'generative') === 'generative' && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'ANTHROPIC_API_KEY is required when REPLY_MODE is generative',
      });
    }
  });

/**
 * Resolve the bot configuration from the environment.
 * Throws a ConfigError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  const credentials = CredentialsSchema.safeParse(env);
  if (!parsed.success || !credentials.success) {
    const issues = [parsed, credentials].flatMap(result => (result.success ? [] : result.error.issues));
    throw new ConfigError(issues.map(issue => issue.message));
  }

  const values = parsed.data;
  const mode = values.REPLY_MODE;

  return {
    discordToken: values.DISCORD_BOT_TOKEN,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    anthropicModel: values.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
    anthropicTimeoutMs: values.ANTHROPIC_TIMEOUT_MS ?? DEFAULT_ANTHROPIC_TIMEOUT_MS,
    mode,
    allowList: parseAllowList(values.ALLOWED_USER_IDS),
    minReplySeconds: values.MIN_REPLY_SECONDS ?? DEFAULT_MIN_REPLY_SECONDS[mode],
    channelId: values.CHANNEL_ID,
    commandPrefix: values.COMMAND_PREFIX ?? DEFAULT_COMMAND_PREFIX,
    personaFile: values.PERSONA_FILE,
  };
}
