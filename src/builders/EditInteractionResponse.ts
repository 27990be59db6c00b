import { Http } from '../http/Http';
import { Message } from '../models/Message';
import { BaseMessageBuilder } from './BaseMessageBuilder';

/**
 * Edit of the initial response
 */
export class EditInteractionResponse extends BaseMessageBuilder {
  async execute(http: Http, token: string): Promise<Message> {
    this.checkOverflow();
    return http.editOriginalInteractionResponse(token, this.toPayload());
  }
}
