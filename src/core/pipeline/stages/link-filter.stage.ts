import { LinkFilterChain } from '../../filters';
import { PipelineStage, RelayContext, StageResult } from '../types';

/**
 * Stage 2: Link filter chain
 * Rewrites the text; individual rule failures are absorbed by the chain
 */
export class LinkFilterStage implements PipelineStage {
  name = 'link-filter';

  constructor(private readonly chain: LinkFilterChain) {}

  async execute(context: RelayContext): Promise<StageResult> {
    const raw = context.message.text ?? '';
    context.filteredText = await this.chain.apply(raw);

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { changed: context.filteredText !== raw },
    };
  }
}
