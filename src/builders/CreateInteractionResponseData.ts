import { MessageFlags } from '../constants';
import { MessagePayload } from '../http/types';
import { BaseMessageBuilder } from './BaseMessageBuilder';

/**
 * Message part of an interaction response
 */
export class CreateInteractionResponseData extends BaseMessageBuilder {
  private messageTts?: boolean;
  private messageFlags?: number;

  tts(tts: boolean): this {
    this.messageTts = tts;
    return this;
  }

  flags(flags: number): this {
    this.messageFlags = flags;
    return this;
  }

  /**
   * Only the invoking user will see the response
   */
  ephemeral(ephemeral: boolean): this {
    const flags = this.messageFlags ?? 0;
    this.messageFlags = ephemeral ? flags | MessageFlags.EPHEMERAL : flags & ~MessageFlags.EPHEMERAL;
    return this;
  }

  toPayload(): MessagePayload {
    const payload = super.toPayload();
    if (this.messageTts !== undefined) {
      payload.tts = this.messageTts;
    }
    if (this.messageFlags !== undefined) {
      payload.flags = this.messageFlags;
    }
    return payload;
  }
}
