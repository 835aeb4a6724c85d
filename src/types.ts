/** Discord user id (a snowflake, kept as its decimal string). */
export type ParticipantId = string;

export type AllowList = ReadonlySet<ParticipantId>;

/**
 * `generative` asks the language model for a reply built from the member's
 * recent messages; `static` answers with a canned tip.
 */
export type ReplyMode = 'generative' | 'static';

/** Returns the current time in seconds. */
export type Clock = () => number;

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface BotConfig {
  discordToken: string;
  anthropicApiKey?: string;
  anthropicModel: string;
  anthropicTimeoutMs: number;
  mode: ReplyMode;
  allowList: AllowList;
  minReplySeconds: number;
  channelId?: string;
  commandPrefix: string;
  personaFile?: string;
}
