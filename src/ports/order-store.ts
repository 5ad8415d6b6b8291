import type { OrderRecord, OrderRefundMetadata } from "../domain/types.js";

export type RefundMetadataResult = "recorded" | "unsupported";

export interface OrderStorePort {
  recordRefundMetadata(orderId: string, metadata: OrderRefundMetadata): Promise<RefundMetadataResult>;
  getOrder(orderId: string): Promise<OrderRecord | null>;
  updateOrder(orderId: string, order: OrderRecord): Promise<OrderRecord | null>;
}
