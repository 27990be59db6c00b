import { InteractionResponseType } from '../enums/InteractionResponseType';
import { ModelException } from '../exceptions/ModelException';
import { Http } from '../http/Http';
import { codePointLength } from './BaseMessageBuilder';
import { CreateInteractionResponse } from './CreateInteractionResponse';
import { CreateInteractionResponseData } from './CreateInteractionResponseData';
import { CreateInteractionResponseFollowup } from './CreateInteractionResponseFollowup';
import { EditInteractionResponse } from './EditInteractionResponse';

describe('builders', () => {
  const createHttp = (): jest.Mocked<Http> => ({
    getOriginalInteractionResponse: jest.fn(),
    createInteractionResponse: jest.fn(),
    editOriginalInteractionResponse: jest.fn(),
    deleteOriginalInteractionResponse: jest.fn(),
    getFollowupMessage: jest.fn(),
    createFollowupMessage: jest.fn(),
    editFollowupMessage: jest.fn(),
    deleteFollowupMessage: jest.fn(),
  });

  describe('codePointLength', () => {
    it('should count astral characters once', () => {
      expect(codePointLength('\u{1F600}a')).toBe(2);
      expect('\u{1F600}a'.length).toBe(3);
    });
  });

  describe('checkOverflow', () => {
    it('should accept content at the limit', () => {
      expect(() => new EditInteractionResponse().content('\u{1F600}'.repeat(2000)).checkOverflow()).not.toThrow();
    });

    it('should report how far content is over the limit', () => {
      const builder = new EditInteractionResponse().content('a'.repeat(2005));

      expect(() => builder.checkOverflow()).toThrow(ModelException);
      expect(() => builder.checkOverflow()).toThrow('message content is 5 code points over the limit of 2000');
    });
  });

  describe('CreateInteractionResponse', () => {
    it('should default to a channel message', () => {
      expect(new CreateInteractionResponse().toPayload()).toEqual({ type: InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE });
    });

    it('should validate the data before sending', async () => {
      const http = createHttp();
      const builder = new CreateInteractionResponse().interactionResponseData(
        new CreateInteractionResponseData().content('a'.repeat(2001)),
      );

      await expect(builder.execute(http, '1', 'test-token')).rejects.toBeInstanceOf(ModelException);
      expect(http.createInteractionResponse).not.toHaveBeenCalled();
    });
  });

  describe('CreateInteractionResponseData', () => {
    it('should toggle the ephemeral flag without touching others', () => {
      const data = new CreateInteractionResponseData().flags(4).ephemeral(true);

      expect(data.toPayload()).toEqual({ flags: 68 });
      expect(data.ephemeral(false).toPayload()).toEqual({ flags: 4 });
    });

    it('should include every field that was set', () => {
      const payload = new CreateInteractionResponseData()
        .content('Saved')
        .tts(false)
        .embed({ title: 'One' })
        .embed({ title: 'Two' })
        .allowedMentions({ parse: [] })
        .components([])
        .toPayload();

      expect(payload).toEqual({
        content: 'Saved',
        tts: false,
        embeds: [{ title: 'One' }, { title: 'Two' }],
        allowed_mentions: { parse: [] },
        components: [],
      });
    });
  });

  describe('CreateInteractionResponseFollowup', () => {
    it('should create without a message id and edit with one', async () => {
      const http = createHttp();
      const builder = new CreateInteractionResponseFollowup().content('Done').ephemeral(true);

      await builder.execute(http, 'test-token');
      await builder.execute(http, 'test-token', '30');

      expect(http.createFollowupMessage).toHaveBeenCalledWith('test-token', { content: 'Done', flags: 64 });
      expect(http.editFollowupMessage).toHaveBeenCalledWith('test-token', '30', { content: 'Done', flags: 64 });
    });
  });
});
