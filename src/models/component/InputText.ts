import { z } from 'zod';
import { ComponentType } from '../../enums/ComponentType';

/**
 * Text input; in a modal submission only `custom_id` and `value` are sent
 */
export const inputTextSchema = z.object({
  type: z.literal(ComponentType.INPUT_TEXT),
  custom_id: z.string(),
  value: z.string().optional(),
  style: z.number().int().optional(),
  label: z.string().optional(),
  min_length: z.number().int().optional(),
  max_length: z.number().int().optional(),
  required: z.boolean().optional(),
  placeholder: z.string().optional(),
});

export type InputText = z.output<typeof inputTextSchema>;
