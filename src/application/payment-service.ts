import { randomUUID } from "node:crypto";
import {
  parseCreatePaymentIntentInput,
  parseUpdatePaymentIntentInput,
} from "../api/validators.js";
import {
  assertTransition,
  decide,
  decideCapture,
  rejectionError,
} from "../domain/state-machine.js";
import type { ChargeRecord, PaymentIntentRecord, PaymentStatus } from "../domain/types.js";
import { AppError, notFound } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { KeyedLock } from "../infra/keyed-lock.js";
import type { PaymentMetricsRegistry } from "../infra/metrics.js";
import type { LoggerPort } from "../ports/logger.js";
import type { ProviderGatewayPort } from "../ports/provider-gateway.js";
import type { RecordStorePort } from "../ports/record-store.js";
import type { IdempotencyLedger } from "./idempotency-ledger.js";
import type { RefundOrchestrator } from "./refund-orchestrator.js";

export interface IdempotentResult<TBody> {
  statusCode: number;
  body: TBody;
  idempotencyReplayed: boolean;
}

export interface PaymentServiceOptions {
  defaultCurrency: string;
  /** Resolve new intents through the gateway before returning from create. */
  syncResolution: boolean;
}

interface CapturedPayment {
  intent: PaymentIntentRecord;
  charge: ChargeRecord;
}

const CREATE_SCOPE = "create_payment_intent";

export class PaymentService {
  private readonly entityLocks = new KeyedLock();

  constructor(
    private readonly store: RecordStorePort,
    private readonly ledger: IdempotencyLedger,
    private readonly gateway: ProviderGatewayPort,
    private readonly refunds: RefundOrchestrator,
    private readonly clock: ClockPort,
    private readonly logger: LoggerPort,
    private readonly options: PaymentServiceOptions,
    private readonly metrics?: PaymentMetricsRegistry,
  ) {}

  async createPaymentIntent(
    payload: unknown,
    idempotencyKey?: string,
  ): Promise<IdempotentResult<PaymentIntentRecord>> {
    const reserved = await this.ledger.reserveOrFetch(
      CREATE_SCOPE,
      idempotencyKey,
      async () => {
        const input = parseCreatePaymentIntentInput(payload, this.options.defaultCurrency);
        const timestamp = this.clock.nowIso();
        const created = await this.store.createPaymentIntent({
          id: `pi_${randomUUID()}`,
          order_id: input.order_id,
          amount: input.amount,
          currency: input.currency,
          status: "requires_confirmation",
          charge_id: null,
          failure_reason: null,
          created_at: timestamp,
          updated_at: timestamp,
        });
        this.metrics?.recordTransition(created.status);
        return created;
      },
      (id) => this.store.getPaymentIntent(id),
    );

    if (reserved.wasExisting) {
      return { statusCode: 200, body: reserved.entity, idempotencyReplayed: true };
    }

    // The key already names the stored intent; a failed resolution is replayed as-is.
    const body = this.options.syncResolution
      ? await this.withIntent(reserved.entity.id, (intent) => this.resolvePending(intent))
      : reserved.entity;
    return { statusCode: 201, body, idempotencyReplayed: false };
  }

  async getPaymentIntent(id: string): Promise<PaymentIntentRecord> {
    const intent = await this.store.getPaymentIntent(id);
    if (!intent) {
      throw notFound("Payment intent", id);
    }
    return intent;
  }

  async listPaymentIntents(): Promise<PaymentIntentRecord[]> {
    return this.store.listPaymentIntents();
  }

  async getCharge(id: string): Promise<ChargeRecord> {
    const charge = await this.store.getCharge(id);
    if (!charge) {
      throw notFound("Charge", id);
    }
    return charge;
  }

  async confirmPaymentIntent(id: string): Promise<PaymentIntentRecord> {
    return this.withIntent(id, (intent) => this.applyTransition(intent, "confirm"));
  }

  async cancelPaymentIntent(id: string): Promise<PaymentIntentRecord> {
    return this.withIntent(id, (intent) => this.applyTransition(intent, "cancel"));
  }

  async capturePaymentIntent(id: string): Promise<ChargeRecord> {
    return this.withIntent(id, async (intent) => (await this.capture(intent)).charge);
  }

  async refundPaymentIntent(id: string): Promise<PaymentIntentRecord> {
    return this.withIntent(id, async (intent) => (await this.refunds.refund(intent)).intent);
  }

  async refundCharge(chargeId: string): Promise<ChargeRecord> {
    const charge = await this.getCharge(chargeId);
    return this.withIntent(charge.payment_intent_id, async (intent) => {
      if (intent.charge_id !== chargeId) {
        throw new AppError(
          "conflict",
          "charge_mismatch",
          `Charge '${chargeId}' is not the capture of payment intent '${intent.id}'.`,
        );
      }
      const result = await this.refunds.refund(intent);
      if (!result.charge) {
        throw notFound("Charge", chargeId);
      }
      return result.charge;
    });
  }

  async updatePaymentIntent(id: string, payload: unknown): Promise<PaymentIntentRecord> {
    return this.withIntent(id, async (intent) => {
      const input = parseUpdatePaymentIntentInput(payload, id, this.options.defaultCurrency);
      if (input.status !== undefined && input.status !== intent.status) {
        throw new AppError(
          "conflict",
          "status_not_updatable",
          "Payment status only changes through confirm, capture, cancel and refund.",
        );
      }
      return this.save({
        ...intent,
        order_id: input.order_id,
        amount: input.amount,
        currency: input.currency,
        updated_at: this.clock.nowIso(),
      });
    });
  }

  private async withIntent<TOutput>(
    id: string,
    operation: (intent: PaymentIntentRecord) => Promise<TOutput>,
  ): Promise<TOutput> {
    return this.entityLocks.run(id, async () => {
      const intent = await this.store.getPaymentIntent(id);
      if (!intent) {
        throw notFound("Payment intent", id);
      }
      return operation(intent);
    });
  }

  private async applyTransition(
    intent: PaymentIntentRecord,
    operation: "confirm" | "cancel",
  ): Promise<PaymentIntentRecord> {
    const decision = decide(operation, intent.status);
    switch (decision.kind) {
      case "unchanged":
        return intent;
      case "reject":
        throw rejectionError(decision);
      case "advance":
        return this.moveTo(intent, decision.next);
    }
  }

  /** Writes the intent before the charge so a retried capture can never mint a second charge. */
  private async capture(intent: PaymentIntentRecord): Promise<CapturedPayment> {
    const decision = decideCapture(intent.status);
    if (decision.kind === "reject") {
      throw rejectionError(decision);
    }

    const chargeId = `ch_${randomUUID()}`;
    const captured = await this.moveTo(intent, decision.next, { charge_id: chargeId });
    const charge = await this.store.createCharge({
      id: chargeId,
      payment_intent_id: captured.id,
      amount: intent.amount,
      status: "captured",
      failure_reason: null,
      created_at: captured.updated_at,
      updated_at: captured.updated_at,
    });
    return { intent: captured, charge };
  }

  private async resolvePending(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    let approved = false;
    let failureReason = "authorization declined";
    try {
      const authorization = await this.gateway.authorize({
        paymentIntentId: intent.id,
        amount: intent.amount,
        currency: intent.currency,
      });
      approved = authorization.ok;
      failureReason = authorization.failureReason ?? failureReason;
    } catch (error) {
      this.logger.warn({ err: error, payment_intent_id: intent.id }, "Authorization raised; canceling intent");
      failureReason = error instanceof Error ? error.message : failureReason;
    }

    if (!approved) {
      return this.moveTo(intent, "canceled", { failure_reason: failureReason });
    }
    const authorized = await this.moveTo(intent, "authorized");
    return (await this.capture(authorized)).intent;
  }

  private async moveTo(
    intent: PaymentIntentRecord,
    next: PaymentStatus,
    changes: Partial<Pick<PaymentIntentRecord, "charge_id" | "failure_reason">> = {},
  ): Promise<PaymentIntentRecord> {
    assertTransition(intent.status, next);
    const saved = await this.save({
      ...intent,
      ...changes,
      status: next,
      updated_at: this.clock.nowIso(),
    });
    this.metrics?.recordTransition(next);
    return saved;
  }

  private async save(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    const saved = await this.store.updatePaymentIntent(intent.id, intent);
    if (!saved) {
      throw notFound("Payment intent", intent.id);
    }
    return saved;
  }
}
