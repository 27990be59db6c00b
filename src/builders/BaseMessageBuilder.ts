import { EMBED_MAX_COUNT, MESSAGE_CODE_LIMIT } from '../constants';
import { ModelException } from '../exceptions/ModelException';
import { AllowedMentions, MessagePayload } from '../http/types';
import { ActionRow } from '../models/component/ActionRow';
import { Embed } from '../models/Embed';

/**
 * Count Unicode code points, the unit Discord measures content in
 */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}

/**
 * Fields shared by every outbound message builder
 */
export abstract class BaseMessageBuilder {
  protected messageContent?: string;
  protected messageEmbeds?: Embed[];
  protected messageComponents?: ActionRow[];
  protected messageAllowedMentions?: AllowedMentions;

  content(content: string): this {
    this.messageContent = content;
    return this;
  }

  /**
   * Append an embed
   */
  embed(embed: Embed): this {
    this.messageEmbeds = [...(this.messageEmbeds ?? []), embed];
    return this;
  }

  /**
   * Replace all embeds
   */
  embeds(embeds: Embed[]): this {
    this.messageEmbeds = [...embeds];
    return this;
  }

  components(components: ActionRow[]): this {
    this.messageComponents = [...components];
    return this;
  }

  allowedMentions(allowedMentions: AllowedMentions): this {
    this.messageAllowedMentions = allowedMentions;
    return this;
  }

  /**
   * Throw `ModelException` when the message breaks a Discord limit
   */
  checkOverflow(): void {
    if (this.messageContent !== undefined) {
      const length = codePointLength(this.messageContent);
      if (length > MESSAGE_CODE_LIMIT) {
        throw ModelException.messageTooLong(length - MESSAGE_CODE_LIMIT, MESSAGE_CODE_LIMIT);
      }
    }
    if (this.messageEmbeds !== undefined && this.messageEmbeds.length > EMBED_MAX_COUNT) {
      throw ModelException.tooManyEmbeds(this.messageEmbeds.length - EMBED_MAX_COUNT, EMBED_MAX_COUNT);
    }
  }

  toPayload(): MessagePayload {
    const payload: MessagePayload = {};
    if (this.messageContent !== undefined) {
      payload.content = this.messageContent;
    }
    if (this.messageEmbeds !== undefined) {
      payload.embeds = this.messageEmbeds;
    }
    if (this.messageComponents !== undefined) {
      payload.components = this.messageComponents;
    }
    if (this.messageAllowedMentions !== undefined) {
      payload.allowed_mentions = this.messageAllowedMentions;
    }
    return payload;
  }
}
