/**
 * Stand-in for IdempotencyService that keeps processed markers in memory.
 * Bind it with `{ provide: IdempotencyService, useValue: ... }`.
 */
export class InMemoryIdempotencyService {
  private readonly processed = new Map<string, Record<string, unknown> | undefined>();

  async isProcessed(eventId: string, handlerName: string): Promise<boolean> {
    return this.processed.has(this.key(eventId, handlerName));
  }

  async markProcessed(
    eventId: string,
    handlerName: string,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    const key = this.key(eventId, handlerName);
    if (!this.processed.has(key)) {
      this.processed.set(key, metadata);
    }
  }

  async processOnce<T>(
    eventId: string,
    handlerName: string,
    handler: () => Promise<T>,
    metadata?: Record<string, unknown>,
  ): Promise<{ executed: boolean; result?: T }> {
    if (await this.isProcessed(eventId, handlerName)) {
      return { executed: false };
    }
    const result = await handler();
    await this.markProcessed(eventId, handlerName, metadata);
    return { executed: true, result };
  }

  /** Metadata stored with a processed marker. */
  metadataFor(eventId: string, handlerName: string): Record<string, unknown> | undefined {
    return this.processed.get(this.key(eventId, handlerName));
  }

  private key(eventId: string, handlerName: string): string {
    return `${handlerName}:${eventId}`;
  }
}
