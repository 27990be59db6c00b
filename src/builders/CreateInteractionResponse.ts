import { InteractionResponseType } from '../enums/InteractionResponseType';
import { Http } from '../http/Http';
import { InteractionResponsePayload } from '../http/types';
import { InteractionId } from '../utils/snowflake';
import { CreateInteractionResponseData } from './CreateInteractionResponseData';

/**
 * Initial response to an interaction
 */
export class CreateInteractionResponse {
  private responseKind: InteractionResponseType = InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE;
  private responseData?: CreateInteractionResponseData;

  kind(kind: InteractionResponseType): this {
    this.responseKind = kind;
    return this;
  }

  interactionResponseData(data: CreateInteractionResponseData): this {
    this.responseData = data;
    return this;
  }

  toPayload(): InteractionResponsePayload {
    const payload: InteractionResponsePayload = { type: this.responseKind };
    if (this.responseData) {
      payload.data = this.responseData.toPayload();
    }
    return payload;
  }

  /**
   * Validate locally, then send the callback
   */
  async execute(http: Http, interactionId: InteractionId, token: string): Promise<void> {
    this.responseData?.checkOverflow();
    await http.createInteractionResponse(interactionId, token, this.toPayload());
  }
}
