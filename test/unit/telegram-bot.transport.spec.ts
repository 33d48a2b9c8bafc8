import axios, { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  TelegramBotTransport,
  TelegramUpdate,
  SourceChatList,
  DeliveryError,
  InboundMessage,
} from '../../src';

interface ApiCall {
  method: string;
  payload: Record<string, unknown>;
}

type Responder = (call: ApiCall, config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function apiError(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_REQUEST,
    config,
    undefined,
    respond(config, data, status),
  );
}

describe('TelegramBotTransport', () => {
  const SOURCE = -1001000000001;
  const OTHER = -1009999999999;

  let calls: ApiCall[];
  let responder: Responder;
  let transport: TelegramBotTransport;

  beforeEach(() => {
    calls = [];
    responder = async (_call, config) => respond(config, { ok: true, result: { message_id: 77 } });

    const adapter: AxiosAdapter = async (config) => {
      const call: ApiCall = {
        method: (config.url ?? '').replace(/^\//, ''),
        payload: typeof config.data === 'string' ? JSON.parse(config.data) : {},
      };
      calls.push(call);
      return responder(call, config);
    };

    transport = new TelegramBotTransport({
      token: 'test-token',
      destinationChat: '@destination',
      sourceChats: new SourceChatList([SOURCE]),
      retryDelayMs: 1,
      http: axios.create({ adapter }),
    });
  });

  describe('toInboundMessage', () => {
    it('should map a channel post from a source chat', () => {
      const update: TelegramUpdate = {
        update_id: 1,
        channel_post: {
          message_id: 10,
          date: 1700000000,
          chat: { id: SOURCE, type: 'channel' },
          text: 'Deal ABC1234',
        },
      };

      expect(transport.toInboundMessage(update)).toEqual({
        sourceId: SOURCE,
        messageId: 10,
        text: 'Deal ABC1234',
        receivedAt: new Date(1700000000 * 1000),
      });
    });

    it('should use the caption and reference the media', () => {
      const update: TelegramUpdate = {
        update_id: 2,
        message: {
          message_id: 11,
          date: 1700000000,
          chat: { id: SOURCE, type: 'supergroup' },
          caption: 'Photo caption',
          photo: [{ file_id: 'x' }],
        },
      };

      const message = transport.toInboundMessage(update);

      expect(message?.text).toBe('Photo caption');
      expect(message?.attachment).toEqual({ sourceId: SOURCE, messageId: 11, kind: 'photo' });
    });

    it('should ignore chats that are not sources', () => {
      const update: TelegramUpdate = {
        update_id: 3,
        channel_post: {
          message_id: 12,
          date: 1700000000,
          chat: { id: OTHER, type: 'channel' },
          text: 'not relayed',
        },
      };

      expect(transport.toInboundMessage(update)).toBeNull();
    });

    it('should ignore updates without a message', () => {
      expect(transport.toInboundMessage({ update_id: 4 })).toBeNull();
    });
  });

  describe('deliver', () => {
    it('should send text silently', async () => {
      const receipt = await transport.deliver({ text: 'Hello', silent: true });

      expect(calls).toEqual([
        {
          method: 'sendMessage',
          payload: { chat_id: '@destination', text: 'Hello', disable_notification: true },
        },
      ]);
      expect(receipt.destinationId).toBe('@destination');
      expect(receipt.messageId).toBe(77);
    });

    it('should copy media with the text as caption', async () => {
      await transport.deliver({
        text: 'Caption',
        silent: true,
        attachment: { sourceId: SOURCE, messageId: 11, kind: 'photo' },
      });

      expect(calls).toEqual([
        {
          method: 'copyMessage',
          payload: {
            chat_id: '@destination',
            from_chat_id: SOURCE,
            message_id: 11,
            caption: 'Caption',
            disable_notification: true,
          },
        },
      ]);
    });

    it('should refuse a message with neither text nor media', async () => {
      await expect(transport.deliver({ text: '', silent: true })).rejects.toThrow(
        'Message has neither text nor media',
      );
      expect(calls).toHaveLength(0);
    });

    it('should retry after a rate limit', async () => {
      let attempts = 0;
      responder = async (_call, config) => {
        attempts++;
        if (attempts === 1) {
          throw apiError(config, 429, {
            ok: false,
            description: 'Too Many Requests: retry after 0',
            parameters: { retry_after: 0 },
          });
        }
        return respond(config, { ok: true, result: { message_id: 78 } });
      };

      const receipt = await transport.deliver({ text: 'Hello', silent: true });

      expect(receipt.messageId).toBe(78);
      expect(calls).toHaveLength(2);
    });

    it('should give up after the last attempt on server errors', async () => {
      responder = async (_call, config) => {
        throw apiError(config, 502, { ok: false, description: 'Bad Gateway' });
      };

      await expect(transport.deliver({ text: 'Hello', silent: true })).rejects.toThrow(
        'Telegram sendMessage failed: (502) Bad Gateway',
      );
      expect(calls).toHaveLength(3);
    });

    it('should not retry client errors', async () => {
      responder = async (_call, config) => {
        throw apiError(config, 400, { ok: false, description: 'Bad Request: chat not found' });
      };

      const failure = transport.deliver({ text: 'Hello', silent: true });

      await expect(failure).rejects.toBeInstanceOf(DeliveryError);
      await expect(failure).rejects.toThrow(
        'Telegram sendMessage failed: (400) Bad Request: chat not found',
      );
      expect(calls).toHaveLength(1);
    });

    it('should not resend when the request got no response', async () => {
      responder = async (_call, config) => {
        throw new AxiosError('timeout of 15000ms exceeded', AxiosError.ECONNABORTED, config);
      };

      await expect(transport.deliver({ text: 'Hello', silent: true })).rejects.toThrow(
        'Telegram sendMessage failed: ECONNABORTED',
      );
      expect(calls).toHaveLength(1);
    });

    it('should fail when the API answers ok: false', async () => {
      responder = async (_call, config) =>
        respond(config, { ok: false, description: 'message is too long' });

      await expect(transport.deliver({ text: 'Hello', silent: true })).rejects.toThrow(
        'Telegram sendMessage failed: message is too long',
      );
    });
  });

  describe('polling', () => {
    it('should hand source messages to the handler and advance the offset', async () => {
      const received: InboundMessage[] = [];
      responder = async (_call, config) => {
        if (calls.length === 1) {
          return respond(config, {
            ok: true,
            result: [
              {
                update_id: 100,
                channel_post: {
                  message_id: 1,
                  date: 1700000000,
                  chat: { id: SOURCE, type: 'channel' },
                  text: 'first',
                },
              },
              {
                update_id: 101,
                channel_post: {
                  message_id: 2,
                  date: 1700000000,
                  chat: { id: OTHER, type: 'channel' },
                  text: 'elsewhere',
                },
              },
            ],
          });
        }

        // Long poll that only ends when the transport stops
        return new Promise<AxiosResponse>((_resolve, reject) => {
          const signal = config.signal;
          if (!signal || signal.aborted) {
            return reject(new Error('aborted'));
          }
          signal.addEventListener?.('abort', () => reject(new Error('aborted')));
        });
      };

      await transport.start(async (message) => {
        received.push(message);
      });

      for (let i = 0; i < 200 && calls.length < 2; i++) {
        await new Promise((resolve) => setTimeout(resolve, 5));
      }
      await transport.stop();

      expect(received.map((m) => m.text)).toEqual(['first']);
      expect(calls[0].payload.offset).toBe(0);
      expect(calls[1].payload.offset).toBe(102);
      expect(calls[1].method).toBe('getUpdates');
    });
  });
});
