import { assertTransition, decideRefund, rejectionError } from "../domain/state-machine.js";
import type {
  ChargeRecord,
  PaymentIntentRecord,
  RefundOutcome,
} from "../domain/types.js";
import { AppError, notFound } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { PaymentMetricsRegistry } from "../infra/metrics.js";
import type { LoggerPort } from "../ports/logger.js";
import type { ProviderGatewayPort } from "../ports/provider-gateway.js";
import type { RecordStorePort } from "../ports/record-store.js";
import type { OrderAnnotator } from "./order-annotator.js";

export const INVALID_REFUND_AMOUNT_REASON = "invalid amount for refund";

export interface RefundResult {
  intent: PaymentIntentRecord;
  charge: ChargeRecord | null;
  replayed: boolean;
}

function describeFault(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return "refund attempt failed unexpectedly";
}

function persistenceFailed(resource: string, id: string, cause: unknown): AppError {
  return new AppError(
    "refund_persistence_failed",
    "refund_persistence_failed",
    `Refund was decided but could not be saved for ${resource.toLowerCase()} '${id}'. Retry the refund.`,
    { cause },
  );
}

/**
 * Drives the refund transition. The caller holds the payment intent's lock.
 * Persisting the payment's own state is authoritative; the order annotation
 * fired afterwards never influences the result.
 */
export class RefundOrchestrator {
  constructor(
    private readonly store: RecordStorePort,
    private readonly gateway: ProviderGatewayPort,
    private readonly annotator: OrderAnnotator,
    private readonly clock: ClockPort,
    private readonly logger: LoggerPort,
    private readonly metrics?: PaymentMetricsRegistry,
  ) {}

  async refund(intent: PaymentIntentRecord): Promise<RefundResult> {
    const charge = intent.charge_id ? await this.store.getCharge(intent.charge_id) : null;
    const decision = decideRefund(intent.status);
    if (decision.kind === "unchanged") {
      return { intent, charge, replayed: true };
    }
    if (decision.kind === "reject") {
      throw rejectionError(decision);
    }

    const refundAmount = charge?.amount ?? intent.amount;
    const outcome = await this.decideOutcome(intent, charge, refundAmount);
    assertTransition(intent.status, outcome.status);

    const decidedAt = this.clock.nowIso();
    const savedCharge = charge
      ? await this.persist("Charge", charge.id, () =>
        this.store.updateCharge(charge.id, {
          ...charge,
          status: outcome.status,
          failure_reason: outcome.failureReason,
          updated_at: decidedAt,
        }))
      : null;
    const savedIntent = await this.persist("Payment intent", intent.id, () =>
      this.store.updatePaymentIntent(intent.id, {
        ...intent,
        status: outcome.status,
        failure_reason: outcome.failureReason,
        updated_at: decidedAt,
      }));

    this.metrics?.recordTransition(outcome.status);
    this.metrics?.recordRefundOutcome(outcome.status);
    this.annotator.annotate(savedIntent.order_id, {
      payment_intent_id: savedIntent.id,
      charge_id: savedCharge?.id ?? null,
      refund_status: outcome.status,
      refund_amount: refundAmount,
      refund_failure_reason: outcome.failureReason,
      refunded_at: decidedAt,
    });

    return { intent: savedIntent, charge: savedCharge, replayed: false };
  }

  private async decideOutcome(
    intent: PaymentIntentRecord,
    charge: ChargeRecord | null,
    amount: number,
  ): Promise<RefundOutcome> {
    // A charge already settled as refunded means an earlier attempt reached
    // the gateway but the intent write was lost.
    if (charge?.status === "refunded") {
      return { status: "refunded", failureReason: null };
    }
    if (!Number.isFinite(amount) || amount <= 0) {
      return { status: "refund_failed", failureReason: INVALID_REFUND_AMOUNT_REASON };
    }

    try {
      const result = await this.gateway.refund({
        paymentIntentId: intent.id,
        chargeId: charge?.id ?? null,
        amount,
        currency: intent.currency,
      });
      if (result.ok) {
        return { status: "refunded", failureReason: null };
      }
      return { status: "refund_failed", failureReason: result.failureReason ?? "refund declined" };
    } catch (error) {
      this.logger.warn({ err: error, payment_intent_id: intent.id }, "Refund attempt raised; marking refund_failed");
      return { status: "refund_failed", failureReason: describeFault(error) };
    }
  }

  private async persist<TRecord>(
    resource: string,
    id: string,
    write: () => Promise<TRecord | null>,
  ): Promise<TRecord> {
    let saved: TRecord | null;
    try {
      saved = await write();
    } catch (error) {
      this.logger.error({ err: error, resource, id }, "Refund decided but not persisted");
      throw persistenceFailed(resource, id, error);
    }
    if (!saved) {
      // The store lost the record after the gateway decided.
      this.logger.error({ resource, id }, "Refund decided but record vanished before write");
      throw persistenceFailed(resource, id, notFound(resource, id));
    }
    return saved;
  }
}
