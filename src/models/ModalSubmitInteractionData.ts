import { z } from 'zod';
import { ComponentType } from '../enums/ComponentType';
import { ActionRow, actionRowSchema } from './component/ActionRow';
import { InputText } from './component/InputText';
import { deepFreeze } from '../utils/deepFreeze';

export const modalSubmitInteractionDataSchema = z.object({
  custom_id: z.string(),
  components: z.array(actionRowSchema),
});

/**
 * Data of a modal submission: the modal's custom id and the submitted rows
 */
export class ModalSubmitInteractionData {
  /** The custom id of the modal */
  readonly custom_id: string;

  readonly components: readonly ActionRow[];

  constructor(customId: string, components: ActionRow[]) {
    this.custom_id = customId;
    this.components = deepFreeze([...components]);
    Object.freeze(this);
  }

  static fromSchema(value: z.output<typeof modalSubmitInteractionDataSchema>): ModalSubmitInteractionData {
    return new ModalSubmitInteractionData(value.custom_id, value.components);
  }

  /**
   * All text inputs, in row order
   */
  textInputs(): InputText[] {
    const inputs: InputText[] = [];
    for (const row of this.components) {
      for (const component of row.components) {
        if (component.type === ComponentType.INPUT_TEXT) {
          inputs.push(component);
        }
      }
    }
    return inputs;
  }

  /**
   * Submitted value of the text input with the given custom id
   */
  getTextInputValue(customId: string): string | undefined {
    return this.textInputs().find((input) => input.custom_id === customId)?.value;
  }

  /**
   * Values chosen in the select menu with the given custom id
   */
  getSelectedValues(customId: string): string[] | undefined {
    for (const row of this.components) {
      for (const component of row.components) {
        if (component.type !== ComponentType.BUTTON && component.type !== ComponentType.INPUT_TEXT && component.custom_id === customId) {
          return component.values ?? [];
        }
      }
    }
    return undefined;
  }

  toJSON(): { custom_id: string; components: ActionRow[] } {
    return {
      custom_id: this.custom_id,
      components: [...this.components],
    };
  }
}
