import { isAllowed } from './access.js';
import { HistoryBuffer } from './history.js';
import { logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import type { ReplyGenerator } from './reply-generator.js';
import { pickTip } from './tips.js';
import type { AllowList, Clock, ParticipantId, RandomSource, ReplyMode } from './types.js';

export const RESTRICTED_MESSAGE = 'Эта функция доступна только участницам группы.';

export type SkipReason = 'no-sender' | 'not-allowed' | 'rate-limited';

export type ReplyOutcome =
  | { kind: 'reply'; text: string }
  | { kind: 'skip'; reason: SkipReason };

export interface CoordinatorOptions {
  mode: ReplyMode;
  allowList: AllowList;
  minReplySeconds: number;
  generator: ReplyGenerator;
  clock?: Clock;
  random?: RandomSource;
}

/**
 * Decides, per inbound event, whether a member gets a reply and what it says.
 *
 * Owns the rate-limit and history state for the lifetime of the bot. Two
 * events from the same member that overlap while a completion is in flight
 * can both pass the rate gate; the later `markSent` wins.
 */
export class ResponseCoordinator {
  readonly mode: ReplyMode;
  private allowList: AllowList;
  private generator: ReplyGenerator;
  private random: RandomSource;
  private rateLimiter: RateLimiter;
  private history: HistoryBuffer;

  constructor(options: CoordinatorOptions) {
    this.mode = options.mode;
    this.allowList = options.allowList;
    this.generator = options.generator;
    this.random = options.random ?? Math.random;
    this.rateLimiter = new RateLimiter(options.minReplySeconds, options.clock);
    this.history = new HistoryBuffer();
  }

  async handleMessage(participant: ParticipantId | null, text: string): Promise<ReplyOutcome> {
    if (participant === null) {
      return { kind: 'skip', reason: 'no-sender' };
    }
    if (!isAllowed(participant, this.allowList, this.mode)) {
      logger.debug('Coordinator', `Skip message from ${participant}: not in allow-list`);
      return { kind: 'skip', reason: 'not-allowed' };
    }

    // Canned tips never look at history, so only the generative mode keeps it
    if (this.mode === 'generative' && text) {
      this.history.record(participant, text);
    }

    if (!this.rateLimiter.canReply(participant)) {
      logger.debug('Coordinator', `Skip message from ${participant}: rate limited`);
      return { kind: 'skip', reason: 'rate-limited' };
    }

    const context = this.mode === 'generative' ? this.history.recent(participant) : [];
    const reply = await this.generator.generate(context);

    this.rateLimiter.markSent(participant);
    return { kind: 'reply', text: reply };
  }

  /**
   * In generative mode the command always answers and leaves the rate budget
   * alone. In static mode it is restricted to allow-listed members and
   * consumes their budget like a message reply does.
   */
  handleTipCommand(participant: ParticipantId | null): ReplyOutcome {
    if (participant === null) {
      return { kind: 'skip', reason: 'no-sender' };
    }

    if (this.mode === 'generative') {
      return { kind: 'reply', text: pickTip(this.random) };
    }

    if (!isAllowed(participant, this.allowList, this.mode)) {
      return { kind: 'reply', text: RESTRICTED_MESSAGE };
    }

    const tip = pickTip(this.random);
    this.rateLimiter.markSent(participant);
    return { kind: 'reply', text: tip };
  }

  recentHistory(participant: ParticipantId): string[] {
    return this.history.recent(participant);
  }

  lastSentAt(participant: ParticipantId): number | undefined {
    return this.rateLimiter.lastSentAt(participant);
  }
}
