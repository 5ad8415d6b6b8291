import type { ChargeRecord, PaymentIntentRecord } from "../domain/types.js";

/**
 * Persistence boundary for payment intents and charges. Absent records are
 * `null`; transport faults surface as downstream `AppError`s.
 */
export interface RecordStorePort {
  getPaymentIntent(id: string): Promise<PaymentIntentRecord | null>;
  createPaymentIntent(intent: PaymentIntentRecord): Promise<PaymentIntentRecord>;
  updatePaymentIntent(id: string, intent: PaymentIntentRecord): Promise<PaymentIntentRecord | null>;
  listPaymentIntents(): Promise<PaymentIntentRecord[]>;
  getCharge(id: string): Promise<ChargeRecord | null>;
  createCharge(charge: ChargeRecord): Promise<ChargeRecord>;
  updateCharge(id: string, charge: ChargeRecord): Promise<ChargeRecord | null>;
}
