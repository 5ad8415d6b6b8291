export interface IdempotencyLedgerPort {
  lookup(scope: string, key: string): Promise<string | null>;
  /** Write-once: an existing mapping for the key is kept. */
  record(scope: string, key: string, resourceId: string): Promise<void>;
  withKeyLock<TOutput>(scope: string, key: string, operation: () => Promise<TOutput>): Promise<TOutput>;
}
