import { z } from 'zod';
import { snowflakeSchema } from '../utils/snowflake';
import { permissionsSchema } from './Permissions';
import { userSchema } from './User';

/**
 * Guild member as sent with interactions
 */
export const memberSchema = z.object({
  user: userSchema,
  nick: z.string().nullish(),
  avatar: z.string().nullish(),
  roles: z.array(snowflakeSchema).optional(),
  joined_at: z.string().optional(),
  premium_since: z.string().nullish(),
  deaf: z.boolean().optional(),
  mute: z.boolean().optional(),
  pending: z.boolean().optional(),
  flags: z.number().int().optional(),
  /** Total permissions of the member in the channel, overwrites included */
  permissions: permissionsSchema.optional(),
  communication_disabled_until: z.string().nullish(),
});

export type Member = z.output<typeof memberSchema>;

/**
 * Wire form of a member, permissions back as a decimal string
 */
export function encodeMember(member: Member): Record<string, unknown> {
  const { permissions, ...rest } = member;
  return permissions === undefined ? rest : { ...rest, permissions: permissions.toString() };
}
