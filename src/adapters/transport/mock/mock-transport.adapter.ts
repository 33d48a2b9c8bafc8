import {
  MessageTransport,
  InboundMessageHandler,
  InboundMessage,
  DeliveryRequest,
  DeliveryReceipt,
  DeliveryError,
} from '../../../core';

/**
 * Mock message transport for testing
 * Records every delivery and lets tests push inbound messages by hand
 */
export class MockTransportAdapter implements MessageTransport {
  readonly name: string;

  private handler: InboundMessageHandler | null = null;
  private deliveries: DeliveryRequest[] = [];
  private failuresRemaining = 0;
  private failureMessage = 'Simulated delivery failure';
  private messageCounter = 0;

  constructor(private readonly options: MockTransportOptions = {}) {
    this.name = options.destinationId ?? 'mock-destination';
  }

  async start(handler: InboundMessageHandler): Promise<void> {
    this.handler = handler;
  }

  async stop(): Promise<void> {
    this.handler = null;
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryReceipt> {
    if (this.options.deliveryDelayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.deliveryDelayMs));
    }

    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new DeliveryError(this.failureMessage, this.name);
    }

    this.deliveries.push({ ...request });
    return {
      destinationId: this.name,
      messageId: ++this.messageCounter,
      deliveredAt: new Date(),
    };
  }

  // ==================== Testing Utilities ====================

  /**
   * Push a message through the registered handler as if it was received
   */
  async emit(message: InboundMessage): Promise<void> {
    if (!this.handler) {
      throw new Error('Transport is not started');
    }
    await this.handler(message);
  }

  /**
   * Fail the next `count` deliveries
   */
  failNext(count = 1, message?: string): void {
    this.failuresRemaining = count;
    if (message) {
      this.failureMessage = message;
    }
  }

  get isStarted(): boolean {
    return this.handler !== null;
  }

  getDeliveries(): DeliveryRequest[] {
    return [...this.deliveries];
  }

  clear(): void {
    this.deliveries = [];
    this.failuresRemaining = 0;
    this.messageCounter = 0;
  }
}

/**
 * Mock transport configuration options
 */
export interface MockTransportOptions {
  destinationId?: string;
  deliveryDelayMs?: number;
}
