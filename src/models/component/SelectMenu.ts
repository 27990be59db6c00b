import { z } from 'zod';
import { ComponentType } from '../../enums/ComponentType';
import { emojiSchema } from './Button';

const selectMenuOptionSchema = z.object({
  label: z.string(),
  value: z.string(),
  description: z.string().optional(),
  emoji: emojiSchema.optional(),
  default: z.boolean().optional(),
});

const selectMenuFields = z.object({
  custom_id: z.string(),
  placeholder: z.string().optional(),
  min_values: z.number().int().optional(),
  max_values: z.number().int().optional(),
  options: z.array(selectMenuOptionSchema).optional(),
  /** Values chosen by the user, present in submissions */
  values: z.array(z.string()).optional(),
  disabled: z.boolean().optional(),
});

export const stringSelectSchema = selectMenuFields.extend({ type: z.literal(ComponentType.STRING_SELECT) });
export const userSelectSchema = selectMenuFields.extend({ type: z.literal(ComponentType.USER_SELECT) });
export const roleSelectSchema = selectMenuFields.extend({ type: z.literal(ComponentType.ROLE_SELECT) });
export const mentionableSelectSchema = selectMenuFields.extend({ type: z.literal(ComponentType.MENTIONABLE_SELECT) });
export const channelSelectSchema = selectMenuFields.extend({ type: z.literal(ComponentType.CHANNEL_SELECT) });

export type SelectMenu =
  | z.output<typeof stringSelectSchema>
  | z.output<typeof userSelectSchema>
  | z.output<typeof roleSelectSchema>
  | z.output<typeof mentionableSelectSchema>
  | z.output<typeof channelSelectSchema>;
