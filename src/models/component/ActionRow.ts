import { z } from 'zod';
import { ComponentType } from '../../enums/ComponentType';
import { buttonSchema } from './Button';
import { inputTextSchema } from './InputText';
import {
  channelSelectSchema,
  mentionableSelectSchema,
  roleSelectSchema,
  stringSelectSchema,
  userSelectSchema,
} from './SelectMenu';

export const actionRowComponentSchema = z.discriminatedUnion('type', [
  buttonSchema,
  stringSelectSchema,
  inputTextSchema,
  userSelectSchema,
  roleSelectSchema,
  mentionableSelectSchema,
  channelSelectSchema,
]);

export type ActionRowComponent = z.output<typeof actionRowComponentSchema>;

/**
 * Row of components, the top-level container of message and modal layouts
 */
export const actionRowSchema = z.object({
  type: z.literal(ComponentType.ACTION_ROW),
  components: z.array(actionRowComponentSchema),
});

export type ActionRow = z.output<typeof actionRowSchema>;
