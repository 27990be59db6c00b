import { z } from 'zod';
import { ComponentType } from '../../enums/ComponentType';
import { snowflakeSchema } from '../../utils/snowflake';

export const emojiSchema = z.object({
  id: snowflakeSchema.nullish(),
  name: z.string().nullish(),
  animated: z.boolean().optional(),
});

/**
 * Button component; link buttons carry `url` instead of `custom_id`
 */
export const buttonSchema = z.object({
  type: z.literal(ComponentType.BUTTON),
  style: z.number().int(),
  label: z.string().optional(),
  emoji: emojiSchema.optional(),
  custom_id: z.string().optional(),
  url: z.string().optional(),
  disabled: z.boolean().optional(),
});

export type Button = z.output<typeof buttonSchema>;
