/**
 * ProcessedMessage domain model - the pipeline already made a final
 * forward/skip decision for this (source, message) identity
 */
export class ProcessedMessage {
  constructor(
    public readonly sourceId: number,
    public readonly messageId: number,
    public readonly createdAt: Date = new Date(),
  ) {}

  get key(): string {
    return processedKey(this.sourceId, this.messageId);
  }
}

export function processedKey(sourceId: number, messageId: number): string {
  return `${sourceId}:${messageId}`;
}
