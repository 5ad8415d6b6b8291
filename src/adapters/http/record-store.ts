import type { ChargeRecord, PaymentIntentRecord } from "../../domain/types.js";
import type { RecordStorePort } from "../../ports/record-store.js";
import type { HttpRecordClient } from "./record-client.js";
import { parseChargeRecord, parsePaymentIntentList, parsePaymentIntentRecord } from "./record-parsers.js";

export class HttpRecordStore implements RecordStorePort {
  constructor(private readonly client: HttpRecordClient) {}

  async getPaymentIntent(id: string): Promise<PaymentIntentRecord | null> {
    const operation = "get payment";
    const body = await this.client.get(`/payments/${encodeURIComponent(id)}`, operation);
    return body === null ? null : parsePaymentIntentRecord(body, operation);
  }

  async createPaymentIntent(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    const operation = "create payment";
    const body = await this.client.post("/payments", intent, operation);
    return parsePaymentIntentRecord(body, operation);
  }

  async updatePaymentIntent(id: string, intent: PaymentIntentRecord): Promise<PaymentIntentRecord | null> {
    const operation = "update payment";
    const body = await this.client.put(`/payments/${encodeURIComponent(id)}`, intent, operation);
    return body === null ? null : parsePaymentIntentRecord(body, operation);
  }

  async listPaymentIntents(): Promise<PaymentIntentRecord[]> {
    const operation = "list payments";
    const body = await this.client.get("/payments", operation);
    return body === null ? [] : parsePaymentIntentList(body, operation);
  }

  async getCharge(id: string): Promise<ChargeRecord | null> {
    const operation = "get charge";
    const body = await this.client.get(`/charges/${encodeURIComponent(id)}`, operation);
    return body === null ? null : parseChargeRecord(body, operation);
  }

  async createCharge(charge: ChargeRecord): Promise<ChargeRecord> {
    const operation = "create charge";
    const body = await this.client.post("/charges", charge, operation);
    return parseChargeRecord(body, operation);
  }

  async updateCharge(id: string, charge: ChargeRecord): Promise<ChargeRecord | null> {
    const operation = "update charge";
    const body = await this.client.put(`/charges/${encodeURIComponent(id)}`, charge, operation);
    return body === null ? null : parseChargeRecord(body, operation);
  }
}
