import type { BotConfig } from '../src/types.js';

export function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    discordToken: 'test-token',
    anthropicApiKey: 'test-key',
    anthropicModel: 'test-model',
    anthropicTimeoutMs: 1000,
    mode: 'generative',
    allowList: new Set(),
    minReplySeconds: 3,
    commandPrefix: '!',
    ...overrides,
  };
}

/** A clock the test moves by hand, in seconds. */
export function manualClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
  };
}
