import { DeliveryReceipt, DeliveryRequest, InboundMessage } from './common.types';

export type InboundMessageHandler = (message: InboundMessage) => Promise<void>;

/**
 * Capability to receive messages from the source feeds and deliver to the
 * destination feed
 */
export interface MessageTransport {
  readonly name: string;

  /**
   * Begin receiving; the handler is awaited for each message in turn
   */
  start(handler: InboundMessageHandler): Promise<void>;

  /**
   * Stop receiving and wait for the in-flight message to finish
   */
  stop(): Promise<void>;

  /**
   * Send to the destination; throws DeliveryError on failure
   */
  deliver(request: DeliveryRequest): Promise<DeliveryReceipt>;
}
