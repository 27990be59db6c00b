import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { z } from 'zod';
import { AppConfig, config, getHttpTimeoutMs } from '../config';
import { DEFAULT_DISCORD_USER_AGENT, DISCORD_API_VERSION, DISCORD_SERVER_URL } from '../constants';
import { DecodeException } from '../exceptions/DecodeException';
import { HttpException } from '../exceptions/HttpException';
import { JsonException } from '../exceptions/JsonException';
import { Message, messageSchema } from '../models/Message';
import { DiscordHelper } from '../support/discordHelper';
import { decodeField } from '../support/jsonMap';
import { getLogger } from '../support/logger';
import { ApplicationId, InteractionId, MessageId } from '../utils/snowflake';
import { Http } from './Http';
import * as routes from './routes';
import { Route } from './routes';
import { InteractionResponsePayload, MessagePayload } from './types';

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Error body returned by the Discord API
 */
const discordErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
});

export interface AxiosHttpOptions {
  applicationId: ApplicationId;
  /** Versioned API base, e.g. https://discord.com/api/v10 */
  apiBase?: string;
  botToken?: string;
  timeoutMs?: number;
  userAgent?: string;
  /** Extra axios defaults, merged last */
  axiosConfig?: CreateAxiosDefaults;
}

/**
 * Http implementation on axios
 *
 * Sends exactly one request per call; failures are thrown, never retried.
 */
export class AxiosHttp implements Http {
  private readonly applicationId: ApplicationId;
  private readonly httpClient: AxiosInstance;
  private readonly log = getLogger('http');

  constructor(options: AxiosHttpOptions) {
    this.applicationId = options.applicationId;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': options.userAgent || DEFAULT_DISCORD_USER_AGENT,
    };
    if (options.botToken) {
      headers.Authorization = `Bot ${options.botToken}`;
    }

    this.httpClient = axios.create({
      baseURL: options.apiBase || `${DISCORD_SERVER_URL}/api/v${DISCORD_API_VERSION}`,
      timeout: options.timeoutMs,
      headers,
      ...options.axiosConfig,
    });
  }

  /**
   * Create an instance from the `discord` configuration section
   */
  static fromConfig(appConfig: AppConfig = config, axiosConfig?: CreateAxiosDefaults): AxiosHttp {
    const { applicationId, botToken, userAgent } = appConfig.discord;
    if (!applicationId) {
      throw new Error('discord.applicationId is not configured, set DISCORD_APPLICATION_ID');
    }
    return new AxiosHttp({
      applicationId,
      apiBase: new DiscordHelper(appConfig).getApiBase(),
      botToken,
      timeoutMs: getHttpTimeoutMs(appConfig),
      userAgent,
      axiosConfig,
    });
  }

  getOriginalInteractionResponse(token: string): Promise<Message> {
    return this.requestMessage('GET', routes.originalResponse(this.applicationId, token));
  }

  async createInteractionResponse(
    interactionId: InteractionId,
    token: string,
    payload: InteractionResponsePayload,
  ): Promise<void> {
    await this.request('POST', routes.interactionCallback(interactionId, token), payload);
  }

  editOriginalInteractionResponse(token: string, payload: MessagePayload): Promise<Message> {
    return this.requestMessage('PATCH', routes.originalResponse(this.applicationId, token), payload);
  }

  async deleteOriginalInteractionResponse(token: string): Promise<void> {
    await this.request('DELETE', routes.originalResponse(this.applicationId, token));
  }

  getFollowupMessage(token: string, messageId: MessageId): Promise<Message> {
    return this.requestMessage('GET', routes.followupMessage(this.applicationId, token, messageId));
  }

  createFollowupMessage(token: string, payload: MessagePayload): Promise<Message> {
    return this.requestMessage('POST', routes.followupMessages(this.applicationId, token), payload);
  }

  editFollowupMessage(token: string, messageId: MessageId, payload: MessagePayload): Promise<Message> {
    return this.requestMessage('PATCH', routes.followupMessage(this.applicationId, token, messageId), payload);
  }

  async deleteFollowupMessage(token: string, messageId: MessageId): Promise<void> {
    await this.request('DELETE', routes.followupMessage(this.applicationId, token, messageId));
  }

  private async requestMessage(method: HttpMethod, route: Route, body?: unknown): Promise<Message> {
    const data = await this.request(method, route, body);
    try {
      return decodeField('message', data, messageSchema);
    } catch (error) {
      if (error instanceof DecodeException) {
        this.log.error({ method, route: route.label, field: error.field }, 'Discord response did not decode');
        throw new JsonException(`${method} ${route.label}`, error);
      }
      throw error;
    }
  }

  private async request(method: HttpMethod, route: Route, body?: unknown): Promise<unknown> {
    this.log.debug({ method, route: route.label }, 'Sending request to Discord');
    try {
      const response = await this.httpClient.request<unknown>({ method, url: route.path, data: body });
      this.log.debug({ method, route: route.label, status: response.status }, 'Request succeeded');
      return response.data;
    } catch (error) {
      throw this.toHttpException(method, route, error);
    }
  }

  private toHttpException(method: HttpMethod, route: Route, error: unknown): Error {
    if (!axios.isAxiosError<unknown>(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }
    if (error.response) {
      const { status, statusText } = error.response;
      const body = discordErrorSchema.safeParse(error.response.data);
      if (body.success) {
        this.log.warn(
          { method, route: route.label, status, discordCode: body.data.code },
          `Discord API error - ${body.data.message}`,
        );
        return new HttpException(
          `${method} ${route.label} failed - HTTP ${status}: ${body.data.message} (code ${body.data.code})`,
          { status, statusText, discordCode: body.data.code },
          error,
        );
      }
      this.log.warn({ method, route: route.label, status }, 'Discord API error');
      return new HttpException(`${method} ${route.label} failed - HTTP ${status}: ${statusText}`, { status, statusText }, error);
    }
    this.log.error({ method, route: route.label, code: error.code }, `Request error: ${error.message}`);
    return new HttpException(`${method} ${route.label} failed: ${error.message}`, { code: error.code }, error);
  }
}
