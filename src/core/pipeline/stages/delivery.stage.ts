import { DeliveryError } from '../../errors';
import { DeliveryRequest, MessageTransport } from '../../interfaces';
import { PipelineStage, RelayContext, StageResult } from '../types';

/**
 * Stage 4: Delivery
 * Always silent. Attachments are sent with the filtered text as caption.
 */
export class DeliveryStage implements PipelineStage {
  name = 'delivery';

  constructor(private readonly transport: MessageTransport) {}

  async execute(context: RelayContext): Promise<StageResult> {
    const request: DeliveryRequest = {
      text: context.filteredText ?? '',
      silent: true,
    };
    if (context.message.attachment) {
      request.attachment = context.message.attachment;
    }

    try {
      context.receipt = await this.transport.deliver(request);
    } catch (error) {
      if (error instanceof DeliveryError) {
        throw error;
      }
      throw new DeliveryError(
        error instanceof Error ? error.message : String(error),
        this.transport.name,
        error instanceof Error ? error : undefined,
      );
    }

    return { success: true, context, shouldContinue: true };
  }
}
