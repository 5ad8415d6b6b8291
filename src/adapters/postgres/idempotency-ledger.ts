import { createHash } from "node:crypto";
import type { Pool } from "pg";
import type { IdempotencyLedgerPort } from "../../ports/idempotency-ledger.js";

function advisoryLockId(scope: string, key: string): bigint {
  const digest = createHash("sha256").update(`${scope}:${key}`).digest();
  return digest.readBigInt64BE(0);
}

export class PostgresIdempotencyLedger implements IdempotencyLedgerPort {
  constructor(private readonly pool: Pool) {}

  async lookup(scope: string, key: string): Promise<string | null> {
    const result = await this.pool.query<{ resource_id: string }>(
      `
        SELECT resource_id
        FROM payment_idempotency_keys
        WHERE scope = $1
          AND key = $2
      `,
      [scope, key],
    );
    return result.rows[0]?.resource_id ?? null;
  }

  async record(scope: string, key: string, resourceId: string): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO payment_idempotency_keys (scope, key, resource_id, created_at)
        VALUES ($1, $2, $3, now())
        ON CONFLICT (scope, key) DO NOTHING
      `,
      [scope, key, resourceId],
    );
  }

  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    const lockKey = advisoryLockId(scope, key);
    const client = await this.pool.connect();
    try {
      await client.query("SELECT pg_advisory_lock($1::bigint)", [lockKey.toString()]);
      return await operation();
    } finally {
      await client.query("SELECT pg_advisory_unlock($1::bigint)", [lockKey.toString()]);
      client.release();
    }
  }
}
