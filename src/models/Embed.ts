import { z } from 'zod';

const embedMediaSchema = z.object({
  url: z.string(),
  proxy_url: z.string().optional(),
  height: z.number().int().optional(),
  width: z.number().int().optional(),
});

/**
 * Rich embed attached to a message
 */
export const embedSchema = z.object({
  title: z.string().optional(),
  type: z.string().optional(),
  description: z.string().optional(),
  url: z.string().optional(),
  timestamp: z.string().optional(),
  color: z.number().int().optional(),
  footer: z.object({ text: z.string(), icon_url: z.string().optional() }).optional(),
  image: embedMediaSchema.optional(),
  thumbnail: embedMediaSchema.optional(),
  author: z.object({ name: z.string(), url: z.string().optional(), icon_url: z.string().optional() }).optional(),
  fields: z.array(z.object({ name: z.string(), value: z.string(), inline: z.boolean().optional() })).optional(),
});

export type Embed = z.output<typeof embedSchema>;
