import type {
  ChargeRecord,
  ChargeStatus,
  OrderRecord,
  PaymentIntentRecord,
  PaymentStatus,
} from "../../domain/types.js";
import { PAYMENT_STATUSES } from "../../domain/types.js";
import { malformedResponse } from "./record-client.js";

const CHARGE_STATUSES: readonly ChargeStatus[] = ["captured", "refunded", "refund_failed"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isPaymentStatus(value: unknown): value is PaymentStatus {
  return PAYMENT_STATUSES.some((status) => status === value);
}

function isChargeStatus(value: unknown): value is ChargeStatus {
  return CHARGE_STATUSES.some((status) => status === value);
}

function nullableString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) {
    return null;
  }
  return typeof value === "string" ? value : undefined;
}

export function parsePaymentIntentRecord(value: unknown, operation: string): PaymentIntentRecord {
  if (!isRecord(value)) {
    throw malformedResponse(operation, "expected a payment object");
  }
  const { id, order_id, amount, currency, status, created_at, updated_at } = value;
  const chargeId = nullableString(value.charge_id);
  const failureReason = nullableString(value.failure_reason);
  if (
    typeof id !== "string"
    || typeof order_id !== "string"
    || typeof amount !== "number"
    || typeof currency !== "string"
    || !isPaymentStatus(status)
    || typeof created_at !== "string"
    || typeof updated_at !== "string"
    || chargeId === undefined
    || failureReason === undefined
  ) {
    throw malformedResponse(operation, "payment fields are missing or mistyped");
  }
  return {
    id,
    order_id,
    amount,
    currency,
    status,
    charge_id: chargeId,
    failure_reason: failureReason,
    created_at,
    updated_at,
  };
}

export function parsePaymentIntentList(value: unknown, operation: string): PaymentIntentRecord[] {
  const items = isRecord(value) && Array.isArray(value.data) ? value.data : value;
  if (!Array.isArray(items)) {
    throw malformedResponse(operation, "expected a list of payments");
  }
  return items.map((item) => parsePaymentIntentRecord(item, operation));
}

export function parseChargeRecord(value: unknown, operation: string): ChargeRecord {
  if (!isRecord(value)) {
    throw malformedResponse(operation, "expected a charge object");
  }
  const { id, payment_intent_id, amount, status, created_at, updated_at } = value;
  const failureReason = nullableString(value.failure_reason);
  if (
    typeof id !== "string"
    || typeof payment_intent_id !== "string"
    || typeof amount !== "number"
    || !isChargeStatus(status)
    || typeof created_at !== "string"
    || typeof updated_at !== "string"
    || failureReason === undefined
  ) {
    throw malformedResponse(operation, "charge fields are missing or mistyped");
  }
  return {
    id,
    payment_intent_id,
    amount,
    status,
    failure_reason: failureReason,
    created_at,
    updated_at,
  };
}

export function parseOrderRecord(value: unknown, operation: string): OrderRecord {
  if (!isRecord(value) || typeof value.id !== "string") {
    throw malformedResponse(operation, "expected an order object with an id");
  }
  return { ...value, id: value.id };
}
