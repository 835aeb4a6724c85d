import type { ParticipantId } from './types.js';

export const DEFAULT_HISTORY_SIZE = 10;

export class HistoryBuffer {
  private messages: Map<ParticipantId, string[]> = new Map();
  private capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    this.capacity = capacity;
  }

  record(participant: ParticipantId, text: string): void {
    const history = this.messages.get(participant) ?? [];
    history.push(text);
    this.messages.set(participant, history.slice(-this.capacity));
  }

  /** Oldest first. */
  recent(participant: ParticipantId): string[] {
    return [...(this.messages.get(participant) ?? [])];
  }
}
