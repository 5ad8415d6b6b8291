import { describe, expect, it } from "vitest";
import { InMemoryIdempotencyLedger } from "../src/adapters/inmemory/idempotency-ledger.js";
import { IdempotencyLedger } from "../src/application/idempotency-ledger.js";
import { AppError } from "../src/infra/app-error.js";
import { KeyedLock } from "../src/infra/keyed-lock.js";

interface Entity {
  id: string;
}

function entityFactory(entities: Map<string, Entity>) {
  let sequence = 0;
  return async (): Promise<Entity> => {
    sequence += 1;
    await new Promise((resolve) => setTimeout(resolve, 5));
    const entity = { id: `pi_${sequence}` };
    entities.set(entity.id, entity);
    return entity;
  };
}

describe("KeyedLock", () => {
  it("runs same-key operations in arrival order and releases the key afterwards", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("k", async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push("first");
      }),
      lock.run("k", async () => {
        order.push("second");
      }),
    ]);

    expect(order).toEqual(["first", "second"]);
    expect(lock.size).toBe(0);
  });

  it("keeps the queue moving after a failed operation", async () => {
    const lock = new KeyedLock();
    const failing = lock.run("k", async () => {
      throw new Error("boom");
    });
    const following = lock.run("k", async () => "next");

    await expect(failing).rejects.toThrowError("boom");
    await expect(following).resolves.toBe("next");
  });
});

describe("IdempotencyLedger", () => {
  it("creates once and replays the recorded entity for the same key", async () => {
    const entities = new Map<string, Entity>();
    const ledger = new IdempotencyLedger(new InMemoryIdempotencyLedger());
    const factory = entityFactory(entities);
    const load = async (id: string) => entities.get(id) ?? null;

    const first = await ledger.reserveOrFetch("create_payment_intent", "K1", factory, load);
    const second = await ledger.reserveOrFetch("create_payment_intent", "K1", factory, load);

    expect(first).toEqual({ entity: { id: "pi_1" }, wasExisting: false });
    expect(second).toEqual({ entity: { id: "pi_1" }, wasExisting: true });
    expect(entities.size).toBe(1);
  });

  it("produces a single entity for concurrent requests sharing a key", async () => {
    const entities = new Map<string, Entity>();
    const ledger = new IdempotencyLedger(new InMemoryIdempotencyLedger());
    const factory = entityFactory(entities);
    const load = async (id: string) => entities.get(id) ?? null;

    const results = await Promise.all(
      Array.from({ length: 5 }, () => ledger.reserveOrFetch("create_payment_intent", "K1", factory, load)),
    );

    expect(entities.size).toBe(1);
    expect(new Set(results.map((result) => result.entity.id))).toEqual(new Set(["pi_1"]));
    expect(results.filter((result) => !result.wasExisting)).toHaveLength(1);
  });

  it("always creates when no key is given", async () => {
    const entities = new Map<string, Entity>();
    const ledger = new IdempotencyLedger(new InMemoryIdempotencyLedger());
    const factory = entityFactory(entities);
    const load = async (id: string) => entities.get(id) ?? null;

    await ledger.reserveOrFetch("create_payment_intent", undefined, factory, load);
    await ledger.reserveOrFetch("create_payment_intent", undefined, factory, load);

    expect(entities.size).toBe(2);
  });

  it("scopes keys independently", async () => {
    const port = new InMemoryIdempotencyLedger();
    await port.record("create_payment_intent", "K1", "pi_1");
    await port.record("create_payment_intent", "K1", "pi_2");

    expect(await port.lookup("create_payment_intent", "K1")).toBe("pi_1");
    expect(await port.lookup("other_scope", "K1")).toBeNull();
  });

  it("does not record a key when creation fails", async () => {
    const port = new InMemoryIdempotencyLedger();
    const ledger = new IdempotencyLedger(port);

    await expect(
      ledger.reserveOrFetch(
        "create_payment_intent",
        "K2",
        async () => {
          throw new AppError("invalid_input", "invalid_amount", "Amount must be a non-negative number.");
        },
        async () => null,
      ),
    ).rejects.toMatchObject({ code: "invalid_amount" });
    expect(await port.lookup("create_payment_intent", "K2")).toBeNull();
  });

  it("reports a recorded key whose entity disappeared", async () => {
    const port = new InMemoryIdempotencyLedger();
    await port.record("create_payment_intent", "K3", "pi_gone");
    const ledger = new IdempotencyLedger(port);

    await expect(
      ledger.reserveOrFetch(
        "create_payment_intent",
        "K3",
        async () => ({ id: "pi_new" }),
        async () => null,
      ),
    ).rejects.toMatchObject({ category: "not_found", code: "idempotent_resource_missing" });
  });
});
