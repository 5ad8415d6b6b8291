import type { IdempotencyLedgerPort } from "../../ports/idempotency-ledger.js";
import { KeyedLock } from "../../infra/keyed-lock.js";

export class InMemoryIdempotencyLedger implements IdempotencyLedgerPort {
  private readonly scopes = new Map<string, Map<string, string>>();
  private readonly keyLocks = new KeyedLock();

  async lookup(scope: string, key: string): Promise<string | null> {
    return this.scopes.get(scope)?.get(key) ?? null;
  }

  async record(scope: string, key: string, resourceId: string): Promise<void> {
    const scopeMap = this.scopes.get(scope) ?? new Map<string, string>();
    if (!scopeMap.has(key)) {
      scopeMap.set(key, resourceId);
    }
    this.scopes.set(scope, scopeMap);
  }

  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    return this.keyLocks.run(`${scope}:${key}`, operation);
  }
}
