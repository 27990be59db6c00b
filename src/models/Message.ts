import { z } from 'zod';
import { snowflakeSchema } from '../utils/snowflake';
import { attachmentSchema } from './Attachment';
import { actionRowSchema } from './component/ActionRow';
import { embedSchema } from './Embed';
import { userSchema } from './User';

/**
 * Discord message
 */
export const messageSchema = z.object({
  id: snowflakeSchema,
  channel_id: snowflakeSchema,
  guild_id: snowflakeSchema.optional(),
  author: userSchema,
  content: z.string(),
  timestamp: z.string(),
  edited_timestamp: z.string().nullish(),
  tts: z.boolean().optional(),
  mention_everyone: z.boolean().optional(),
  mentions: z.array(userSchema).optional(),
  mention_roles: z.array(snowflakeSchema).optional(),
  attachments: z.array(attachmentSchema).optional(),
  embeds: z.array(embedSchema).optional(),
  pinned: z.boolean().optional(),
  type: z.number().int().optional(),
  flags: z.number().int().optional(),
  webhook_id: snowflakeSchema.optional(),
  application_id: snowflakeSchema.optional(),
  components: z.array(actionRowSchema).optional(),
});

export type Message = z.output<typeof messageSchema>;
