import { z } from 'zod';
import { snowflakeSchema } from '../utils/snowflake';

/**
 * File attached to a message
 */
export const attachmentSchema = z.object({
  id: snowflakeSchema,
  filename: z.string(),
  size: z.number().int(),
  url: z.string(),
  proxy_url: z.string(),
  content_type: z.string().optional(),
  description: z.string().optional(),
  height: z.number().int().nullish(),
  width: z.number().int().nullish(),
  ephemeral: z.boolean().optional(),
});

export type Attachment = z.output<typeof attachmentSchema>;
