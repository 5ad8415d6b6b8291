import type { ChargeRecord, PaymentIntentRecord } from "../../domain/types.js";
import type { RecordStorePort } from "../../ports/record-store.js";
import { AppError } from "../../infra/app-error.js";

export class InMemoryRecordStore implements RecordStorePort {
  private readonly paymentIntents = new Map<string, PaymentIntentRecord>();
  private readonly charges = new Map<string, ChargeRecord>();

  async getPaymentIntent(id: string): Promise<PaymentIntentRecord | null> {
    const intent = this.paymentIntents.get(id);
    return intent ? { ...intent } : null;
  }

  async createPaymentIntent(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    if (this.paymentIntents.has(intent.id)) {
      throw new AppError("downstream_rejected", "duplicate_record", `Payment intent '${intent.id}' already exists.`, {
        statusCode: 409,
        downstreamStatus: 409,
      });
    }
    this.paymentIntents.set(intent.id, { ...intent });
    return { ...intent };
  }

  async updatePaymentIntent(id: string, intent: PaymentIntentRecord): Promise<PaymentIntentRecord | null> {
    if (!this.paymentIntents.has(id)) {
      return null;
    }
    this.paymentIntents.set(id, { ...intent, id });
    return { ...intent, id };
  }

  async listPaymentIntents(): Promise<PaymentIntentRecord[]> {
    return [...this.paymentIntents.values()]
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map((intent) => ({ ...intent }));
  }

  async getCharge(id: string): Promise<ChargeRecord | null> {
    const charge = this.charges.get(id);
    return charge ? { ...charge } : null;
  }

  async createCharge(charge: ChargeRecord): Promise<ChargeRecord> {
    if (this.charges.has(charge.id)) {
      throw new AppError("downstream_rejected", "duplicate_record", `Charge '${charge.id}' already exists.`, {
        statusCode: 409,
        downstreamStatus: 409,
      });
    }
    this.charges.set(charge.id, { ...charge });
    return { ...charge };
  }

  async updateCharge(id: string, charge: ChargeRecord): Promise<ChargeRecord | null> {
    if (!this.charges.has(id)) {
      return null;
    }
    this.charges.set(id, { ...charge, id });
    return { ...charge, id };
  }
}
