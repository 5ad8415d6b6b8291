import type { IdempotencyLedgerPort } from "../ports/idempotency-ledger.js";
import { AppError } from "../infra/app-error.js";

export interface ReservedEntity<TEntity> {
  entity: TEntity;
  wasExisting: boolean;
}

/**
 * Maps caller idempotency keys to the id of the resource created under them.
 * Idempotency is opt-in: without a key the factory always runs.
 */
export class IdempotencyLedger {
  constructor(private readonly port: IdempotencyLedgerPort) {}

  async reserveOrFetch<TEntity extends { id: string }>(
    scope: string,
    key: string | undefined,
    factory: () => Promise<TEntity>,
    load: (id: string) => Promise<TEntity | null>,
  ): Promise<ReservedEntity<TEntity>> {
    if (!key) {
      return { entity: await factory(), wasExisting: false };
    }

    return this.port.withKeyLock(scope, key, async () => {
      const existingId = await this.port.lookup(scope, key);
      if (existingId) {
        const existing = await load(existingId);
        if (!existing) {
          throw new AppError(
            "not_found",
            "idempotent_resource_missing",
            `Resource '${existingId}' recorded for this Idempotency-Key no longer exists.`,
          );
        }
        return { entity: existing, wasExisting: true };
      }

      const entity = await factory();
      await this.port.record(scope, key, entity.id);
      return { entity, wasExisting: false };
    });
  }
}
