/**
 * Descriptive display name for a source feed
 */
export class ChannelLabel {
  constructor(
    public readonly sourceId: number,
    public name: string,
  ) {}
}

/**
 * Per-source aggregate shown by the admin surface
 */
export interface ChannelStatistics {
  sourceId: number;
  name: string;
  messages: number;
  configured: boolean;
}
