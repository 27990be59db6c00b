import { InteractionId, MessageId } from '../utils/snowflake';
import { Message } from '../models/Message';
import { InteractionResponsePayload, MessagePayload } from './types';

/**
 * Discord REST calls used to answer interactions
 *
 * Implementations throw `HttpException` when the request fails and
 * `JsonException` when a successful response does not decode. A single
 * instance may be shared by any number of interactions.
 */
export interface Http {
  getOriginalInteractionResponse(token: string): Promise<Message>;
  createInteractionResponse(interactionId: InteractionId, token: string, payload: InteractionResponsePayload): Promise<void>;
  editOriginalInteractionResponse(token: string, payload: MessagePayload): Promise<Message>;
  deleteOriginalInteractionResponse(token: string): Promise<void>;
  getFollowupMessage(token: string, messageId: MessageId): Promise<Message>;
  createFollowupMessage(token: string, payload: MessagePayload): Promise<Message>;
  editFollowupMessage(token: string, messageId: MessageId, payload: MessagePayload): Promise<Message>;
  deleteFollowupMessage(token: string, messageId: MessageId): Promise<void>;
}
