/**
 * Reference to media carried by a source message
 * Delivery copies it from the source rather than re-uploading
 */
export interface MessageAttachment {
  sourceId: number;
  messageId: number;
  kind: string;
}

/**
 * A message received from one of the source feeds
 */
export interface InboundMessage {
  sourceId: number;
  messageId: number;
  text?: string | null;
  attachment?: MessageAttachment | null;
  receivedAt?: Date;
}

/**
 * A single send to the destination feed
 */
export interface DeliveryRequest {
  text: string;
  attachment?: MessageAttachment;
  silent: boolean;
}

export interface DeliveryReceipt {
  destinationId: string;
  messageId?: number;
  deliveredAt: Date;
}

export interface CreateFilterRuleDto {
  pattern: string;
  replacement?: string;
}

export interface UpdateFilterRuleDto {
  pattern: string;
  replacement?: string;
}

export type FilterMoveDirection = 'up' | 'down';

export interface SourceMessageCount {
  sourceId: number;
  count: number;
}

export interface StorageStatistics {
  processed: number;
  duplicateCodes: number;
  filters: number;
  channels: number;
}

/**
 * Result of an ad-hoc read-only query, one array per row
 */
export interface QueryResult {
  columns: string[];
  rows: unknown[][];
}
