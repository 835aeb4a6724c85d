import type { MessageReplyOptions } from 'discord.js';

export const DISCORD_MESSAGE_LIMIT = 2000;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Render reply text as a Discord markdown reply. Mentions inside the text are
 * never resolved; only the member being replied to is pinged.
 */
export function formatReply(text: string): MessageReplyOptions {
  let content = text.trim();
  if (content.length > DISCORD_MESSAGE_LIMIT) {
    let end = DISCORD_MESSAGE_LIMIT - 1;
    // Keep surrogate pairs whole
    if (isHighSurrogate(content.charCodeAt(end - 1))) end -= 1;
    content = content.slice(0, end) + '…';
  }

  return {
    content,
    allowedMentions: { parse: [], repliedUser: true },
  };
}
