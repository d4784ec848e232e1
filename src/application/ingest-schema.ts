import { z } from 'zod';

const name = z.string().min(1).max(255);
const channel = z.string().min(1).max(255);
const text = z.string().max(4096);

/**
 * Zod schema for one callback forwarded by the chat bridge.
 *
 * `callback` selects which recorder callback runs; each variant carries
 * exactly the arguments that callback takes. `user` may be a full
 * `nick!user@host` mask.
 */
export const chatCallbackSchema = z.discriminatedUnion('callback', [
  z.object({ callback: z.literal('connect') }),
  z.object({ callback: z.literal('disconnect'), reason: z.string().max(1024).default('') }),
  z.object({ callback: z.literal('join'), channel }),
  z.object({ callback: z.literal('message'), user: name, channel, text }),
  z.object({ callback: z.literal('action'), user: name, channel, text }),
  z.object({ callback: z.literal('nick_change'), old_nick: name, new_nick: name }),
  z.object({ callback: z.literal('user_joined'), user: name, channel }),
  z.object({ callback: z.literal('user_left'), user: name, channel }),
]);

export type ChatCallback = z.infer<typeof chatCallbackSchema>;
