import type { AllowList, ParticipantId, ReplyMode } from './types.js';

const PARTICIPANT_ID_PATTERN = /^\d+$/;

/**
 * Parse a comma-separated list of Discord user ids.
 * Entries that are not plain digit strings are dropped.
 */
export function parseAllowList(raw: string | undefined): AllowList {
  if (!raw) return new Set();

  const ids = raw
    .split(',')
    .map(value => value.trim())
    .filter(value => PARTICIPANT_ID_PATTERN.test(value));

  return new Set(ids);
}

/**
 * In generative mode an empty allow-list lets everyone through.
 * In static mode only listed members are served, so an empty list serves nobody.
 */
export function isAllowed(participant: ParticipantId, allowList: AllowList, mode: ReplyMode): boolean {
  if (mode === 'generative' && allowList.size === 0) return true;
  return allowList.has(participant);
}
