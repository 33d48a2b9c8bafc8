import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { Agent } from 'https';
import {
  MessageTransport,
  InboundMessageHandler,
  InboundMessage,
  MessageAttachment,
  DeliveryRequest,
  DeliveryReceipt,
  DeliveryError,
  SourceChatList,
  delay,
  toError,
} from '../../../core';
import {
  TelegramApiResponse,
  TelegramMessage,
  TelegramUpdate,
  MEDIA_KINDS,
} from './telegram.types';

// Force IPv4 to avoid timeout issues in Docker
const httpsAgent = new Agent({ family: 4 });

export interface TelegramBotTransportOptions {
  token: string;
  /**
   * Destination chat id or @username
   */
  destinationChat: string;
  sourceChats: SourceChatList;
  pollTimeoutSeconds?: number;
  retryDelayMs?: number;
  maxSendAttempts?: number;
  apiBaseUrl?: string;
  http?: AxiosInstance;
}

/**
 * Telegram Bot API transport
 *
 * Receives channel posts and group messages from the source chats by long
 * polling getUpdates, and delivers silently to the destination chat with
 * sendMessage, or copyMessage when the source message carries media.
 */
export class TelegramBotTransport implements MessageTransport {
  readonly name = 'telegram';

  private readonly log = new Logger(TelegramBotTransport.name);
  private readonly http: AxiosInstance;
  private readonly sources: SourceChatList;
  private readonly pollTimeoutSeconds: number;
  private readonly retryDelayMs: number;
  private readonly maxSendAttempts: number;

  private offset = 0;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: TelegramBotTransportOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: `${options.apiBaseUrl ?? 'https://api.telegram.org'}/bot${options.token}`,
        httpsAgent,
      });
    this.sources = options.sourceChats;
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 30;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.maxSendAttempts = options.maxSendAttempts ?? 3;
  }

  async start(handler: InboundMessageHandler): Promise<void> {
    if (this.loop) {
      return;
    }

    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.poll(handler, abort.signal);
    this.log.log(`Listening to ${this.sources.size} source chat(s)`);
  }

  async stop(): Promise<void> {
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    this.abort = null;
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryReceipt> {
    const { method, payload } = this.buildSend(request);

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.call<{ message_id: number }>(method, payload, {
          timeout: 15_000,
        });
        return {
          destinationId: this.options.destinationChat,
          messageId: result.message_id,
          deliveredAt: new Date(),
        };
      } catch (error) {
        const retryAfter = this.retryDelayFor(error, attempt);
        if (retryAfter === null || attempt >= this.maxSendAttempts) {
          throw new DeliveryError(
            `Telegram ${method} failed: ${this.describe(error)}`,
            this.options.destinationChat,
            toError(error),
          );
        }

        this.log.warn(
          `Telegram attempt ${attempt}/${this.maxSendAttempts} failed: ${this.describe(error)}`,
        );
        await delay(retryAfter);
      }
    }
  }

  /**
   * Map one update to an inbound message, or null when it is not from a
   * source chat
   */
  toInboundMessage(update: TelegramUpdate): InboundMessage | null {
    const msg = update.channel_post ?? update.message;
    if (!msg || !this.sources.has(msg.chat.id)) {
      return null;
    }

    const message: InboundMessage = {
      sourceId: msg.chat.id,
      messageId: msg.message_id,
      text: msg.text ?? msg.caption ?? '',
      receivedAt: new Date(msg.date * 1000),
    };

    const attachment = this.detectAttachment(msg);
    if (attachment) {
      message.attachment = attachment;
    }
    return message;
  }

  private async poll(handler: InboundMessageHandler, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.call<TelegramUpdate[]>(
          'getUpdates',
          {
            offset: this.offset,
            timeout: this.pollTimeoutSeconds,
            allowed_updates: ['message', 'channel_post'],
          },
          { timeout: (this.pollTimeoutSeconds + 10) * 1000, signal },
        );
      } catch (error) {
        if (signal.aborted) break;
        this.log.warn(`getUpdates failed: ${this.describe(error)}`);
        await delay(this.retryDelayMs, signal);
        continue;
      }

      for (const update of updates) {
        this.offset = update.update_id + 1;

        const message = this.toInboundMessage(update);
        if (message) {
          try {
            await handler(message);
          } catch (error) {
            this.log.error(
              `Handler failed for ${message.sourceId}:${message.messageId}: ${this.describe(error)}`,
            );
          }
        }

        if (signal.aborted) break;
      }
    }
  }

  private async call<T>(
    method: string,
    payload: Record<string, unknown>,
    config: { timeout: number; signal?: AbortSignal },
  ): Promise<T> {
    const response = await this.http.post<TelegramApiResponse<T>>(`/${method}`, payload, config);
    const body = response.data;
    if (!body.ok || body.result === undefined) {
      throw new Error(body.description ?? `${method} returned no result`);
    }
    return body.result;
  }

  private buildSend(request: DeliveryRequest): {
    method: string;
    payload: Record<string, unknown>;
  } {
    const chatId = this.options.destinationChat;

    if (request.attachment) {
      return {
        method: 'copyMessage',
        payload: {
          chat_id: chatId,
          from_chat_id: request.attachment.sourceId,
          message_id: request.attachment.messageId,
          caption: request.text,
          disable_notification: request.silent,
        },
      };
    }

    if (!request.text) {
      throw new DeliveryError('Message has neither text nor media', chatId);
    }

    return {
      method: 'sendMessage',
      payload: {
        chat_id: chatId,
        text: request.text,
        disable_notification: request.silent,
      },
    };
  }

  private detectAttachment(msg: TelegramMessage): MessageAttachment | null {
    const kind = MEDIA_KINDS.find((key) => msg[key] !== undefined);
    return kind ? { sourceId: msg.chat.id, messageId: msg.message_id, kind } : null;
  }

  /**
   * Delay before the next send attempt, or null when the error is final
   * Only rate limits and server errors are retried
   */
  private retryDelayFor(error: unknown, attempt: number): number | null {
    if (!axios.isAxiosError<TelegramApiResponse<unknown>>(error)) {
      return null;
    }

    const status = error.response?.status;
    if (status === 429) {
      const retryAfter = error.response?.data?.parameters?.retry_after;
      return retryAfter !== undefined ? retryAfter * 1000 : this.retryDelayMs * attempt;
    }
    if (status !== undefined && status >= 500) {
      return this.retryDelayMs * attempt;
    }
    // No response: the message may already have been posted
    return null;
  }

  private describe(error: unknown): string {
    if (axios.isAxiosError<TelegramApiResponse<unknown>>(error)) {
      const description = error.response?.data?.description;
      const status = error.response?.status;
      return description
        ? `(${status}) ${description}`
        : error.code ?? error.message;
    }
    return toError(error).message;
  }
}
