import type { OrderRecord, OrderRefundMetadata } from "../../domain/types.js";
import type { OrderStorePort, RefundMetadataResult } from "../../ports/order-store.js";
import { isDownstreamError } from "../../infra/app-error.js";
import type { HttpRecordClient } from "./record-client.js";
import { parseOrderRecord } from "./record-parsers.js";

// Statuses meaning the record service has no refund-metadata endpoint.
const UNSUPPORTED_STATUSES: ReadonlySet<number> = new Set([404, 405, 501]);

export class HttpOrderStore implements OrderStorePort {
  constructor(private readonly client: HttpRecordClient) {}

  async recordRefundMetadata(orderId: string, metadata: OrderRefundMetadata): Promise<RefundMetadataResult> {
    try {
      await this.client.post(
        `/orders/${encodeURIComponent(orderId)}/refund-metadata`,
        metadata,
        "record order refund metadata",
      );
      return "recorded";
    } catch (error) {
      if (
        isDownstreamError(error)
        && error.downstreamStatus !== undefined
        && UNSUPPORTED_STATUSES.has(error.downstreamStatus)
      ) {
        return "unsupported";
      }
      throw error;
    }
  }

  async getOrder(orderId: string): Promise<OrderRecord | null> {
    const operation = "get order";
    const body = await this.client.get(`/orders/${encodeURIComponent(orderId)}`, operation);
    return body === null ? null : parseOrderRecord(body, operation);
  }

  async updateOrder(orderId: string, order: OrderRecord): Promise<OrderRecord | null> {
    const operation = "update order";
    const body = await this.client.put(`/orders/${encodeURIComponent(orderId)}`, order, operation);
    return body === null ? null : parseOrderRecord(body, operation);
  }
}
