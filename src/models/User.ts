import { z } from 'zod';
import { snowflakeSchema } from '../utils/snowflake';

/**
 * Discord user
 *
 * Only `id` is guaranteed; partial users show up in mentions and in members
 * sent with some gateway events.
 */
export const userSchema = z.object({
  id: snowflakeSchema,
  username: z.string().optional(),
  discriminator: z.string().optional(),
  global_name: z.string().nullish(),
  avatar: z.string().nullish(),
  bot: z.boolean().optional(),
  system: z.boolean().optional(),
  public_flags: z.number().int().optional(),
  banner: z.string().nullish(),
  accent_color: z.number().int().nullish(),
});

export type User = z.output<typeof userSchema>;

/**
 * Get the name shown for a user
 */
export function getUserDisplayName(user: User): string {
  return user.global_name ?? user.username ?? user.id;
}
