import { InteractionResponseType } from '../enums/InteractionResponseType';
import { ActionRow } from '../models/component/ActionRow';
import { Embed } from '../models/Embed';

/**
 * Which mentions in the content are allowed to ping
 */
export interface AllowedMentions {
  parse?: Array<'roles' | 'users' | 'everyone'>;
  roles?: string[];
  users?: string[];
  replied_user?: boolean;
}

/**
 * Message body of responses and follow-ups
 */
export interface MessagePayload {
  content?: string;
  tts?: boolean;
  embeds?: Embed[];
  components?: ActionRow[];
  flags?: number;
  allowed_mentions?: AllowedMentions;
}

/**
 * Body of an interaction callback
 */
export interface InteractionResponsePayload {
  type: InteractionResponseType;
  data?: MessagePayload;
}
