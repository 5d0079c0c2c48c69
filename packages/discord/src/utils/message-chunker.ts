import { DISCORD_MESSAGE_LIMIT } from '@poe-relay/shared';
import { PrefixTooLongError } from '../../types/errors.js';

/**
 * Split a reply into Discord-sized messages.
 *
 * The prefix (speaker and model labels) is only attached to the first
 * segment. Lengths are counted in code points so a segment never ends in
 * half of a surrogate pair.
 *
 * @throws PrefixTooLongError when the prefix alone leaves no room for body text
 */
export function chunkReply(prefix: string, body: string, limit: number = DISCORD_MESSAGE_LIMIT): string[] {
  const prefixLength = Array.from(prefix).length;
  if (prefixLength >= limit) {
    throw new PrefixTooLongError(prefixLength, limit);
  }

  const chars = Array.from(body);
  if (prefixLength + chars.length <= limit) {
    return [prefix + body];
  }

  const available = limit - prefixLength;
  const segments = [prefix + chars.slice(0, available).join('')];
  for (let i = available; i < chars.length; i += limit) {
    segments.push(chars.slice(i, i + limit).join(''));
  }
  return segments;
}
