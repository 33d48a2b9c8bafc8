import {
  InboundMessage,
  MessageAttachment,
  RuntimeSettings,
  TimeOfDay,
  DEFAULT_CLEANUP_DAYS,
  DEFAULT_CLEANUP_TIME,
  DEFAULT_DUPLICATE_CODE_PATTERN,
} from '../../core';

/**
 * Factory for inbound messages
 * Used for testing the pipeline without a live transport
 */
export class MockMessageFactory {
  private static messageCounter = 0;

  static readonly DEFAULT_SOURCE_ID = -1001000000001;

  /**
   * A plain text message; message ids increase per call unless given
   */
  static text(text: string, options: MessageOptions = {}): InboundMessage {
    return {
      sourceId: options.sourceId ?? this.DEFAULT_SOURCE_ID,
      messageId: options.messageId ?? ++this.messageCounter,
      text,
      receivedAt: options.receivedAt ?? new Date(),
    };
  }

  /**
   * A media message with the text as its caption
   */
  static withAttachment(
    caption: string,
    kind = 'photo',
    options: MessageOptions = {},
  ): InboundMessage {
    const message = this.text(caption, options);
    const attachment: MessageAttachment = {
      sourceId: message.sourceId,
      messageId: message.messageId,
      kind,
    };
    return { ...message, attachment };
  }

  /**
   * The same (source, message) identity delivered twice
   */
  static redelivery(message: InboundMessage): InboundMessage {
    return { ...message, receivedAt: new Date() };
  }

  static reset(): void {
    this.messageCounter = 0;
  }
}

/**
 * Common message sequences
 */
export class MessageScenarios {
  /**
   * Two messages from different sources carrying the same code
   */
  static crossPostedDeal(code = 'ABC1234'): [InboundMessage, InboundMessage] {
    return [
      MockMessageFactory.text(`Deal ${code} today only`, { sourceId: -1001000000001 }),
      MockMessageFactory.text(`Also here: ${code.toLowerCase()}`, { sourceId: -1001000000002 }),
    ];
  }
}

export interface MessageOptions {
  sourceId?: number;
  messageId?: number;
  receivedAt?: Date;
}

/**
 * Runtime settings held in memory, for tests that do not need a `.env` file
 */
export class InMemorySettings implements RuntimeSettings {
  cleanupDays = DEFAULT_CLEANUP_DAYS;
  cleanupTime: TimeOfDay = { ...DEFAULT_CLEANUP_TIME };
  clearCodesWhenDisabled = true;
  duplicateCodePattern = DEFAULT_DUPLICATE_CODE_PATTERN;

  constructor(overrides: Partial<InMemorySettingsValues> = {}) {
    Object.assign(this, overrides);
  }

  getCleanupDays(): number {
    return this.cleanupDays;
  }

  getCleanupTime(): TimeOfDay {
    return this.cleanupTime;
  }

  shouldClearCodesWhenDisabled(): boolean {
    return this.clearCodesWhenDisabled;
  }

  getDuplicateCodePattern(): string {
    return this.duplicateCodePattern;
  }
}

export interface InMemorySettingsValues {
  cleanupDays: number;
  cleanupTime: TimeOfDay;
  clearCodesWhenDisabled: boolean;
  duplicateCodePattern: string;
}
