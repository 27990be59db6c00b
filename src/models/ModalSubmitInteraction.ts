import { z } from 'zod';
import { CreateInteractionResponse } from '../builders/CreateInteractionResponse';
import { CreateInteractionResponseFollowup } from '../builders/CreateInteractionResponseFollowup';
import { EditInteractionResponse } from '../builders/EditInteractionResponse';
import { InteractionResponseType } from '../enums/InteractionResponseType';
import { DecodeException } from '../exceptions/DecodeException';
import { Http } from '../http/Http';
import { Result } from '../result/Result';
import { JsonMap } from '../support/jsonMap';
import { getLogger } from '../support/logger';
import {
  ApplicationId,
  ChannelId,
  GuildId,
  InteractionId,
  MessageId,
  snowflakeSchema,
  snowflakeTimestamp,
} from '../utils/snowflake';
import { deepFreeze } from '../utils/deepFreeze';
import { encodeMember, Member, memberSchema } from './Member';
import { Message, messageSchema } from './Message';
import { ModalSubmitInteractionData, modalSubmitInteractionDataSchema } from './ModalSubmitInteractionData';
import { Permissions, permissionsSchema } from './Permissions';
import { User, userSchema } from './User';

const log = getLogger('modal-submit');

/**
 * Fields of a modal submit interaction, as named on the wire
 */
export interface ModalSubmitInteractionFields {
  id: InteractionId;
  application_id: ApplicationId;
  data: ModalSubmitInteractionData;
  guild_id?: GuildId;
  channel_id: ChannelId;
  member?: Member;
  user: User;
  token: string;
  version: number;
  message?: Message;
  app_permissions?: Permissions;
  locale: string;
  guild_locale?: string;
}

export type UserResolution = { ok: true; user: User } | { ok: false; error: DecodeException };

/**
 * Pick the invoking user: the `user` key wins, otherwise the member's user
 */
export function resolveUser(user: User | undefined, member: Member | undefined): UserResolution {
  if (user) {
    return { ok: true, user };
  }
  if (member) {
    return { ok: true, user: member.user };
  }
  return { ok: false, error: DecodeException.missingUser() };
}

/**
 * An interaction triggered by a modal submit
 *
 * Instances are frozen, nested values included. `member`, `guild_id`, `app_permissions` and
 * `guild_locale` are only sent for interactions in a guild; `message` only
 * when the modal was opened from a message component.
 */
export class ModalSubmitInteraction implements ModalSubmitInteractionFields {
  /** Id of the interaction */
  readonly id: InteractionId;
  /** Id of the application this interaction is for */
  readonly application_id: ApplicationId;
  readonly data: ModalSubmitInteractionData;
  readonly guild_id?: GuildId;
  readonly channel_id: ChannelId;
  readonly member?: Member;
  /** The invoking user, taken from `member.user` in guilds */
  readonly user: User;
  /** Continuation token for responding, valid for 15 minutes */
  readonly token: string;
  /** Always 1 */
  readonly version: number;
  /** The message the modal was opened from */
  readonly message?: Message;
  /** Permissions of the app in the channel the interaction was sent from */
  readonly app_permissions?: Permissions;
  /** Selected language of the invoking user */
  readonly locale: string;
  /** Preferred locale of the guild */
  readonly guild_locale?: string;

  constructor(fields: ModalSubmitInteractionFields) {
    this.id = fields.id;
    this.application_id = fields.application_id;
    this.data = fields.data;
    this.guild_id = fields.guild_id;
    this.channel_id = fields.channel_id;
    this.member = deepFreeze(fields.member);
    this.user = deepFreeze(fields.user);
    this.token = fields.token;
    this.version = fields.version;
    this.message = deepFreeze(fields.message);
    this.app_permissions = fields.app_permissions;
    this.locale = fields.locale;
    this.guild_locale = fields.guild_locale;
    Object.freeze(this);
  }

  /**
   * Decode an interaction from its JSON object
   *
   * Unknown keys are ignored. Throws `DecodeException` naming the first
   * missing or malformed key.
   */
  static fromJson(value: unknown): ModalSubmitInteraction {
    const map = JsonMap.from(value, 'modal submit interaction');

    const member = map.removeOptional('member', memberSchema);
    const resolution = resolveUser(map.removeOptional('user', userSchema), member);
    if (!resolution.ok) {
      throw resolution.error;
    }

    const id = map.remove('id', snowflakeSchema);
    const applicationId = map.remove('application_id', snowflakeSchema);
    const data = map.remove('data', modalSubmitInteractionDataSchema);
    const channelId = map.remove('channel_id', snowflakeSchema);
    const token = map.remove('token', z.string());
    const version = map.remove('version', z.number().int().nonnegative().max(255));
    const locale = map.remove('locale', z.string());

    return new ModalSubmitInteraction({
      id,
      application_id: applicationId,
      data: ModalSubmitInteractionData.fromSchema(data),
      guild_id: map.removeOptional('guild_id', snowflakeSchema),
      channel_id: channelId,
      member,
      user: resolution.user,
      token,
      version,
      message: map.removeOptional('message', messageSchema),
      app_permissions: map.removeOptional('app_permissions', permissionsSchema),
      locale,
      guild_locale: map.removeOptional('guild_locale', z.string()),
    });
  }

  /**
   * Decode an interaction from a JSON string
   */
  static parse(json: string): ModalSubmitInteraction {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (e) {
      throw DecodeException.invalidJson(e instanceof Error ? e : new Error(String(e)));
    }
    return ModalSubmitInteraction.fromJson(value);
  }

  /**
   * Wire form; keys of absent optional fields are left out
   */
  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      id: this.id,
      application_id: this.application_id,
      data: this.data.toJSON(),
      channel_id: this.channel_id,
      user: this.user,
      token: this.token,
      version: this.version,
      locale: this.locale,
    };
    if (this.guild_id !== undefined) {
      json.guild_id = this.guild_id;
    }
    if (this.member !== undefined) {
      json.member = encodeMember(this.member);
    }
    if (this.message !== undefined) {
      json.message = this.message;
    }
    if (this.app_permissions !== undefined) {
      json.app_permissions = this.app_permissions.toString();
    }
    if (this.guild_locale !== undefined) {
      json.guild_locale = this.guild_locale;
    }
    return json;
  }

  /**
   * When the interaction was created, from its id
   */
  get createdAt(): Date {
    return snowflakeTimestamp(this.id);
  }

  /**
   * Whether the interaction was sent from a guild
   */
  inGuild(): boolean {
    return this.guild_id !== undefined;
  }

  /**
   * Get the initial response message
   *
   * Fails with an HTTP error when there is no response yet.
   */
  getInteractionResponse(http: Http): Promise<Result<Message>> {
    return this.run('getInteractionResponse', () => http.getOriginalInteractionResponse(this.token));
  }

  /**
   * Send the initial response. Content must be at most 2000 code points.
   */
  createInteractionResponse(http: Http, builder: CreateInteractionResponse): Promise<Result<void>> {
    return this.run('createInteractionResponse', () => builder.execute(http, this.id, this.token));
  }

  /**
   * Edit the initial response. Content must be at most 2000 code points.
   */
  editOriginalInteractionResponse(http: Http, builder: EditInteractionResponse): Promise<Result<Message>> {
    return this.run('editOriginalInteractionResponse', () => builder.execute(http, this.token));
  }

  /**
   * Delete the initial response
   *
   * Fails with an HTTP error if the response was already deleted.
   */
  deleteOriginalInteractionResponse(http: Http): Promise<Result<void>> {
    return this.run('deleteOriginalInteractionResponse', () => http.deleteOriginalInteractionResponse(this.token));
  }

  /**
   * Send a follow-up message. Content must be at most 2000 code points.
   */
  createFollowupMessage(http: Http, builder: CreateInteractionResponseFollowup): Promise<Result<Message>> {
    return this.run('createFollowupMessage', () => builder.execute(http, this.token));
  }

  /**
   * Edit a follow-up message. Content must be at most 2000 code points.
   */
  editFollowupMessage(
    http: Http,
    messageId: MessageId,
    builder: CreateInteractionResponseFollowup,
  ): Promise<Result<Message>> {
    return this.run('editFollowupMessage', () => builder.execute(http, this.token, messageId));
  }

  /**
   * Delete a follow-up message
   *
   * Fails with an HTTP error if the message was already deleted.
   */
  deleteFollowupMessage(http: Http, messageId: MessageId): Promise<Result<void>> {
    return this.run('deleteFollowupMessage', () => http.deleteFollowupMessage(this.token, messageId));
  }

  /**
   * Acknowledge the submission now and update the message later
   */
  defer(http: Http): Promise<Result<void>> {
    const builder = new CreateInteractionResponse().kind(InteractionResponseType.DEFERRED_UPDATE_MESSAGE);
    return this.createInteractionResponse(http, builder);
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<Result<T>> {
    try {
      const value = await call();
      log.debug({ operation, interactionId: this.id }, 'Interaction operation succeeded');
      return Result.successWithResult(value);
    } catch (error) {
      const result = Result.fromError<T>(error);
      log.warn(
        { operation, interactionId: this.id, code: result.getCode() },
        `Interaction operation failed - ${result.getDescription()}`,
      );
      return result;
    }
  }
}
