import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AppConfig } from '../config';
import { HttpException } from '../exceptions/HttpException';
import { JsonException } from '../exceptions/JsonException';
import { AxiosHttp } from './AxiosHttp';

type Responder = (config: InternalAxiosRequestConfig) => AxiosResponse;

const respond =
  (status: number, data: unknown, statusText = 'OK'): Responder =>
  (config) => {
    const response: AxiosResponse = { data, status, statusText, headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
    }
    return response;
  };

const createHttp = (responder: Responder, build?: (adapter: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>) => AxiosHttp) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    return responder(config);
  };
  const http = build
    ? build(adapter)
    : new AxiosHttp({
        applicationId: '2',
        apiBase: 'https://discord.test/api/v10',
        botToken: 'test-secret',
        axiosConfig: { adapter },
      });
  return { http, requests };
};

const rejection = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the request to fail');
};

describe('AxiosHttp', () => {
  const message = {
    id: '30',
    channel_id: '3',
    author: { id: '2', username: 'helper', bot: true },
    content: 'Thanks!',
    timestamp: '2024-05-01T10:00:00.000000+00:00',
  };

  it('should post the interaction callback', async () => {
    const { http, requests } = createHttp(respond(204, '', 'No Content'));

    await http.createInteractionResponse('1', 'test-token', { type: 6 });

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('post');
    expect(requests[0].baseURL).toBe('https://discord.test/api/v10');
    expect(requests[0].url).toBe('/interactions/1/test-token/callback');
    expect(JSON.parse(String(requests[0].data))).toEqual({ type: 6 });
    expect(requests[0].headers.Authorization).toBe('Bot test-secret');
    expect(requests[0].headers['User-Agent']).toBe('DiscordBot (modal-interactions, 1.0.0)');
  });

  it('should decode the original response', async () => {
    const { http, requests } = createHttp(respond(200, message));

    const result = await http.getOriginalInteractionResponse('test-token');

    expect(requests[0].method).toBe('get');
    expect(requests[0].url).toBe('/webhooks/2/test-token/messages/@original');
    expect(result).toEqual(message);
  });

  it('should patch the original response', async () => {
    const { http, requests } = createHttp(respond(200, { ...message, content: 'Edited' }));

    const result = await http.editOriginalInteractionResponse('test-token', { content: 'Edited' });

    expect(requests[0].method).toBe('patch');
    expect(JSON.parse(String(requests[0].data))).toEqual({ content: 'Edited' });
    expect(result.content).toBe('Edited');
  });

  it('should delete the original response', async () => {
    const { http, requests } = createHttp(respond(204, '', 'No Content'));

    await http.deleteOriginalInteractionResponse('test-token');

    expect(requests[0].method).toBe('delete');
    expect(requests[0].url).toBe('/webhooks/2/test-token/messages/@original');
  });

  it('should route follow-up messages', async () => {
    const { http, requests } = createHttp(respond(200, message));

    await http.createFollowupMessage('test-token', { content: 'Thanks!' });
    await http.getFollowupMessage('test-token', '30');
    await http.editFollowupMessage('test-token', '30', { content: 'Thanks!' });

    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      'post /webhooks/2/test-token',
      'get /webhooks/2/test-token/messages/30',
      'patch /webhooks/2/test-token/messages/30',
    ]);
  });

  it('should escape the token in paths', async () => {
    const { http, requests } = createHttp(respond(204, '', 'No Content'));

    await http.deleteFollowupMessage('a/b', '30');

    expect(requests[0].url).toBe('/webhooks/2/a%2Fb/messages/30');
  });

  it('should escape the message id in paths', async () => {
    const { http, requests } = createHttp(respond(204, '', 'No Content'));

    await http.deleteFollowupMessage('test-token', '../..');

    expect(requests[0].url).toBe('/webhooks/2/test-token/messages/..%2F..');
  });

  it('should surface Discord error codes', async () => {
    const { http } = createHttp(respond(404, { message: 'Unknown Message', code: 10008 }, 'Not Found'));

    const error = await rejection(http.deleteFollowupMessage('test-token', '30'));

    expect(error).toBeInstanceOf(HttpException);
    expect(error).toMatchObject({
      status: 404,
      statusText: 'Not Found',
      discordCode: 10008,
      message: 'DELETE /webhooks/2/:token/messages/30 failed - HTTP 404: Unknown Message (code 10008)',
    });
  });

  it('should surface statuses without a Discord error body', async () => {
    const { http } = createHttp(respond(502, '<html></html>', 'Bad Gateway'));

    const error = await rejection(http.getOriginalInteractionResponse('test-token'));

    expect(error).toBeInstanceOf(HttpException);
    expect(error).toMatchObject({
      status: 502,
      message: 'GET /webhooks/2/:token/messages/@original failed - HTTP 502: Bad Gateway',
    });
    expect(error).not.toHaveProperty('discordCode', 10008);
  });

  it('should surface transport failures', async () => {
    const { http } = createHttp((config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    });

    const error = await rejection(http.createFollowupMessage('test-token', { content: 'Thanks!' }));

    expect(error).toBeInstanceOf(HttpException);
    expect(error).toMatchObject({
      code: 'ECONNREFUSED',
      message: 'POST /webhooks/2/:token failed: connect ECONNREFUSED',
    });
    expect(error instanceof HttpException && error.status).toBeUndefined();
  });

  it('should report bodies that do not decode', async () => {
    const { http } = createHttp(respond(200, { id: '30' }));

    const error = await rejection(http.getFollowupMessage('test-token', '30'));

    expect(error).toBeInstanceOf(JsonException);
    expect(error instanceof JsonException && error.decodeError.field).toBe('message.channel_id');
  });

  describe('fromConfig', () => {
    const appConfig = (applicationId?: string): AppConfig => ({
      logging: { level: 'info' },
      discord: {
        server: 'https://discord.test/',
        apiVersion: 9,
        applicationId,
        timeout: '5s',
        userAgent: 'test-agent',
      },
    });

    it('should build the client from configuration', async () => {
      const { http, requests } = createHttp(respond(204, '', 'No Content'), (adapter) =>
        AxiosHttp.fromConfig(appConfig('2'), { adapter }),
      );

      await http.deleteOriginalInteractionResponse('test-token');

      expect(requests[0].baseURL).toBe('https://discord.test/api/v9');
      expect(requests[0].timeout).toBe(5000);
      expect(requests[0].headers['User-Agent']).toBe('test-agent');
      expect(requests[0].headers.Authorization).toBeUndefined();
    });

    it('should require an application id', () => {
      expect(() => AxiosHttp.fromConfig(appConfig())).toThrow(
        'discord.applicationId is not configured, set DISCORD_APPLICATION_ID',
      );
    });
  });
});
