import type { OrderRecord, OrderRefundMetadata } from "../../domain/types.js";
import type { OrderStorePort, RefundMetadataResult } from "../../ports/order-store.js";

interface InMemoryOrderStoreOptions {
  refundMetadataSupported?: boolean;
}

export class InMemoryOrderStore implements OrderStorePort {
  private readonly orders = new Map<string, OrderRecord>();
  private readonly refundMetadata = new Map<string, OrderRefundMetadata[]>();
  private readonly refundMetadataSupported: boolean;

  constructor(options: InMemoryOrderStoreOptions = {}) {
    this.refundMetadataSupported = options.refundMetadataSupported ?? false;
  }

  async recordRefundMetadata(orderId: string, metadata: OrderRefundMetadata): Promise<RefundMetadataResult> {
    if (!this.refundMetadataSupported) {
      return "unsupported";
    }
    const entries = this.refundMetadata.get(orderId) ?? [];
    entries.push({ ...metadata });
    this.refundMetadata.set(orderId, entries);
    return "recorded";
  }

  async getOrder(orderId: string): Promise<OrderRecord | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async updateOrder(orderId: string, order: OrderRecord): Promise<OrderRecord | null> {
    if (!this.orders.has(orderId)) {
      return null;
    }
    this.orders.set(orderId, { ...order, id: orderId });
    return { ...order, id: orderId };
  }

  seedOrder(order: OrderRecord): void {
    this.orders.set(order.id, { ...order });
  }

  getRefundMetadata(orderId: string): OrderRefundMetadata[] {
    return [...(this.refundMetadata.get(orderId) ?? [])];
  }
}
