import { ProcessingOutcome } from '../domain/enums';
import {
  DeliveryReceipt,
  InboundMessage,
  MessageTransport,
  StorageAdapter,
} from '../interfaces';
import { LinkFilterChain } from '../filters';
import { CodeExtractor, DuplicateCache } from '../codes';
import { StatsRecorder } from '../stats';

/**
 * Message processing context passed through the pipeline
 */
export interface RelayContext {
  // Raw input
  message: InboundMessage;
  receivedAt: Date;

  // Processing metadata
  processingId: string;
  startTime: Date;

  // Link filter chain output
  filteredText?: string;

  // Code dedup
  codes: string[];
  duplicateCodes: string[];

  // Delivery
  receipt?: DeliveryReceipt;

  // Processing outcome
  outcome?: ProcessingOutcome;
  error?: Error;

  metadata: Record<string, unknown>;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: RelayContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: RelayContext): Promise<StageResult>;
}

/**
 * Reported once per message, whatever its outcome
 */
export interface MessageFate {
  sourceId: number;
  messageId: number;
  outcome: ProcessingOutcome;
  latencyMs: number;
  codes: string[];
  error?: Error;
}

export interface PipelineHooks {
  onMessageFate?: (fate: MessageFate) => Promise<void> | void;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  storageAdapter: StorageAdapter;
  transport: MessageTransport;
  linkFilterChain: LinkFilterChain;
  codeExtractor: CodeExtractor;
  statsRecorder?: StatsRecorder;

  hooks?: PipelineHooks;
  logErrors?: boolean;
}

/**
 * Processing result returned by the pipeline
 */
export interface ProcessingResult {
  success: boolean;
  processingId: string;
  outcome: ProcessingOutcome;
  filteredText?: string;
  codes: string[];
  duplicateCodes: string[];
  receipt?: DeliveryReceipt;
  error?: Error;
  metrics: ProcessingMetrics;
}

export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  filtered: boolean;
  delivered: boolean;
  committed: boolean;
}
