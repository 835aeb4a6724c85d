import type { Clock, ParticipantId } from './types.js';

export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Remembers when each member last got a reply and refuses a new one until
 * `minReplySeconds` have passed. Entries are never evicted.
 */
export class RateLimiter {
  private lastSent: Map<ParticipantId, number> = new Map();
  private minReplySeconds: number;
  private clock: Clock;

  constructor(minReplySeconds: number, clock: Clock = systemClock) {
    this.minReplySeconds = minReplySeconds;
    this.clock = clock;
  }

  canReply(participant: ParticipantId): boolean {
    const last = this.lastSent.get(participant);
    if (last === undefined) return true;
    return this.clock() - last >= this.minReplySeconds;
  }

  markSent(participant: ParticipantId): void {
    this.lastSent.set(participant, this.clock());
  }

  lastSentAt(participant: ParticipantId): number | undefined {
    return this.lastSent.get(participant);
  }
}
