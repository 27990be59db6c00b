import { MessageFlags } from '../constants';
import { Http } from '../http/Http';
import { MessagePayload } from '../http/types';
import { Message } from '../models/Message';
import { MessageId } from '../utils/snowflake';
import { BaseMessageBuilder } from './BaseMessageBuilder';

/**
 * Follow-up message, created or edited depending on `execute`'s message id
 */
export class CreateInteractionResponseFollowup extends BaseMessageBuilder {
  private messageTts?: boolean;
  private messageEphemeral?: boolean;

  tts(tts: boolean): this {
    this.messageTts = tts;
    return this;
  }

  ephemeral(ephemeral: boolean): this {
    this.messageEphemeral = ephemeral;
    return this;
  }

  toPayload(): MessagePayload {
    const payload = super.toPayload();
    if (this.messageTts !== undefined) {
      payload.tts = this.messageTts;
    }
    if (this.messageEphemeral) {
      payload.flags = MessageFlags.EPHEMERAL;
    }
    return payload;
  }

  async execute(http: Http, token: string, messageId?: MessageId): Promise<Message> {
    this.checkOverflow();
    if (messageId === undefined) {
      return http.createFollowupMessage(token, this.toPayload());
    }
    return http.editFollowupMessage(token, messageId, this.toPayload());
  }
}
