import type { OrderRecord, OrderRefundMetadata } from "../domain/types.js";
import { notFound } from "../infra/app-error.js";
import type { AnnotationOutcome, PaymentMetricsRegistry } from "../infra/metrics.js";
import type { LoggerPort } from "../ports/logger.js";
import type { OrderStorePort } from "../ports/order-store.js";

interface OrderAnnotatorOptions {
  enabled: boolean;
}

/**
 * Best-effort refund annotation of the originating order. `annotate` returns
 * nothing: its outcome only ever reaches the logger and metrics.
 */
export class OrderAnnotator {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly orders: OrderStorePort,
    private readonly logger: LoggerPort,
    private readonly options: OrderAnnotatorOptions = { enabled: true },
    private readonly metrics?: PaymentMetricsRegistry,
  ) {}

  annotate(orderId: string, metadata: OrderRefundMetadata): void {
    if (!this.options.enabled) {
      this.record("skipped");
      return;
    }

    const task: Promise<void> = this.run(orderId, metadata)
      .then(
        (outcome) => {
          this.record(outcome);
          this.logger.info(
            { order_id: orderId, payment_intent_id: metadata.payment_intent_id, outcome },
            "Order annotated with refund outcome",
          );
        },
        (error: unknown) => {
          this.record("failed");
          this.logger.warn(
            { err: error, order_id: orderId, payment_intent_id: metadata.payment_intent_id },
            "Order refund annotation failed; refund result unaffected",
          );
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /** Waits for every annotation started so far. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async run(orderId: string, metadata: OrderRefundMetadata): Promise<Extract<AnnotationOutcome, "recorded" | "merged">> {
    try {
      const result = await this.orders.recordRefundMetadata(orderId, metadata);
      if (result === "recorded") {
        return "recorded";
      }
      this.logger.debug({ order_id: orderId }, "Refund metadata endpoint unavailable; merging into order");
    } catch (error) {
      this.logger.debug({ err: error, order_id: orderId }, "Refund metadata call failed; merging into order");
    }

    const order = await this.orders.getOrder(orderId);
    if (!order) {
      throw notFound("Order", orderId);
    }
    const merged: OrderRecord = { ...order, ...metadata, id: order.id };
    const updated = await this.orders.updateOrder(orderId, merged);
    if (!updated) {
      throw notFound("Order", orderId);
    }
    return "merged";
  }

  private record(outcome: AnnotationOutcome): void {
    this.metrics?.recordOrderAnnotation(outcome);
  }
}
