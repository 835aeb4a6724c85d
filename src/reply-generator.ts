import { ClaudeClient, type CompletionClient } from './claude.js';
import { DEFAULT_HISTORY_SIZE } from './history.js';
import { logger } from './logger.js';
import { pickTip } from './tips.js';
import type { BotConfig, RandomSource, ReplyMode } from './types.js';

export interface ReplyGenerator {
  readonly kind: ReplyMode;
  /** Resolves to the reply text; never rejects. */
  generate(history: readonly string[]): Promise<string>;
}

export class StaticReplyGenerator implements ReplyGenerator {
  readonly kind = 'static';
  private random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  async generate(): Promise<string> {
    return pickTip(this.random);
  }
}

/**
 * Summarise the member's recent messages into a single user turn, or ask for
 * general support when there is nothing to go on.
 */
export function buildPrompt(history: readonly string[]): string {
  if (history.length === 0) {
    return 'Поддержи участницу, будь чутким слушателем и дай мягкий совет.';
  }

  const context = history
    .slice(-DEFAULT_HISTORY_SIZE)
    .map((text, index) => `${index + 1}. ${text}`)
    .join('\n');

  return [
    `Вот последние сообщения участницы (до ${DEFAULT_HISTORY_SIZE}):`,
    context,
    'Сделай вывод по общей сути и ответь бережно.',
  ].join('\n');
}

export class GenerativeReplyGenerator implements ReplyGenerator {
  readonly kind = 'generative';
  private client: CompletionClient;
  private random: RandomSource;

  constructor(client: CompletionClient, random: RandomSource = Math.random) {
    this.client = client;
    this.random = random;
  }

  async generate(history: readonly string[]): Promise<string> {
    const result = await this.client.complete(buildPrompt(history));

    if (result.ok) {
      return result.text;
    }

    logger.warn('Generator', `Completion failed (${result.reason}), falling back to a tip`, result.detail ? { detail: result.detail } : undefined);
    return pickTip(this.random);
  }
}

export interface ReplyGeneratorDeps {
  random?: RandomSource;
  completionClient?: CompletionClient;
}

export function createReplyGenerator(config: BotConfig, deps: ReplyGeneratorDeps = {}): ReplyGenerator {
  if (config.mode === 'static') {
    return new StaticReplyGenerator(deps.random);
  }

  if (deps.completionClient) {
    return new GenerativeReplyGenerator(deps.completionClient, deps.random);
  }
  if (!config.anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY is required in generative mode');
  }

  const client = new ClaudeClient({
    apiKey: config.anthropicApiKey,
    model: config.anthropicModel,
    timeoutMs: config.anthropicTimeoutMs,
    personaFile: config.personaFile,
  });
  return new GenerativeReplyGenerator(client, deps.random);
}
