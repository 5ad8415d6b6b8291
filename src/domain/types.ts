export type PaymentStatus =
  | "requires_confirmation"
  | "authorized"
  | "captured"
  | "refunded"
  | "refund_failed"
  | "canceled";

export type ChargeStatus = Extract<PaymentStatus, "captured" | "refunded" | "refund_failed">;

export type RefundOutcomeStatus = Extract<PaymentStatus, "refunded" | "refund_failed">;

export interface PaymentIntentRecord {
  id: string;
  order_id: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  charge_id: string | null;
  failure_reason: string | null;
  created_at: string;
  updated_at: string;
}

export interface ChargeRecord {
  id: string;
  payment_intent_id: string;
  amount: number;
  status: ChargeStatus;
  failure_reason: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreatePaymentIntentInput {
  order_id: string;
  amount: number;
  currency: string;
}

export interface UpdatePaymentIntentInput {
  order_id: string;
  amount: number;
  currency: string;
  status?: PaymentStatus;
}

export interface RefundOutcome {
  status: RefundOutcomeStatus;
  failureReason: string | null;
}

export interface OrderRefundMetadata {
  payment_intent_id: string;
  charge_id: string | null;
  refund_status: RefundOutcomeStatus;
  refund_amount: number;
  refund_failure_reason: string | null;
  refunded_at: string;
}

export type OrderRecord = Record<string, unknown> & { id: string };

export const PAYMENT_STATUSES: readonly PaymentStatus[] = [
  "requires_confirmation",
  "authorized",
  "captured",
  "refunded",
  "refund_failed",
  "canceled",
];
