import type {
  CreatePaymentIntentInput,
  PaymentStatus,
  UpdatePaymentIntentInput,
} from "../domain/types.js";
import { PAYMENT_STATUSES } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]+$/;
const NUMERIC_STRING_PATTERN = /^\s*-?(\d+(\.\d*)?|\.\d+)\s*$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPaymentStatus(value: unknown): value is PaymentStatus {
  return PAYMENT_STATUSES.some((status) => status === value);
}

function invalidInput(code: string, message: string): AppError {
  return new AppError("invalid_input", code, message);
}

function assertObjectBody(payload: unknown): asserts payload is Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError("invalid_input", "invalid_request_body", "Request body must be an object.", {
      statusCode: 400,
    });
  }
}

/** Accepts a finite number or a numeric string; rejects negatives. */
export function parseAmount(value: unknown): number {
  let amount: number | undefined;
  if (typeof value === "number") {
    amount = value;
  } else if (typeof value === "string" && NUMERIC_STRING_PATTERN.test(value)) {
    amount = Number(value);
  }
  if (amount === undefined || !Number.isFinite(amount) || amount < 0) {
    throw invalidInput("invalid_amount", "Amount must be a non-negative number.");
  }
  return amount;
}

// `orderId` is accepted for callers that send camelCase bodies.
function parseOrderId(payload: Record<string, unknown>): string {
  const value = payload.order_id ?? payload.orderId;
  if (!isString(value)) {
    throw invalidInput("invalid_order_id", "order_id is required.");
  }
  return value.trim();
}

function parseCurrency(value: unknown, defaultCurrency: string): string {
  if (value === undefined || value === null) {
    return defaultCurrency;
  }
  if (!isString(value)) {
    throw invalidInput("invalid_currency", "currency must be a non-empty string.");
  }
  return value.trim().toUpperCase();
}

export function parseCreatePaymentIntentInput(
  payload: unknown,
  defaultCurrency: string,
): CreatePaymentIntentInput {
  assertObjectBody(payload);
  return {
    order_id: parseOrderId(payload),
    amount: parseAmount(payload.amount),
    currency: parseCurrency(payload.currency, defaultCurrency),
  };
}

export function parseUpdatePaymentIntentInput(
  payload: unknown,
  pathId: string,
  defaultCurrency: string,
): UpdatePaymentIntentInput {
  assertObjectBody(payload);
  if (payload.id !== undefined && payload.id !== pathId) {
    throw invalidInput("immutable_id", "Payment id in body must match the path.");
  }
  const input: UpdatePaymentIntentInput = {
    order_id: parseOrderId(payload),
    amount: parseAmount(payload.amount),
    currency: parseCurrency(payload.currency, defaultCurrency),
  };
  if (payload.status !== undefined) {
    if (!isPaymentStatus(payload.status)) {
      throw invalidInput("invalid_status", `status must be one of: ${PAYMENT_STATUSES.join(", ")}.`);
    }
    input.status = payload.status;
  }
  return input;
}

/** Idempotency is opt-in: a missing or blank header yields `undefined`. */
export function normalizeIdempotencyKey(headers: Record<string, unknown>, maxLength: number): string | undefined {
  const keyHeader = headers["idempotency-key"];
  if (keyHeader === undefined) {
    return undefined;
  }
  if (typeof keyHeader !== "string") {
    throw invalidInput("invalid_idempotency_key", "Idempotency-Key must be sent once.");
  }
  const key = keyHeader.trim();
  if (key.length === 0) {
    return undefined;
  }
  if (key.length > maxLength) {
    throw invalidInput("invalid_idempotency_key", `Idempotency-Key length must be <= ${maxLength}.`);
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
    throw invalidInput("invalid_idempotency_key", "Idempotency-Key contains invalid characters.");
  }
  return key;
}

export function requireResourceId(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new AppError("invalid_input", "invalid_path_parameter", `${fieldName} is required.`, {
      statusCode: 400,
    });
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      "invalid_input",
      "invalid_path_parameter",
      `${fieldName} length must be between 1 and 255 characters.`,
      { statusCode: 400 },
    );
  }
  return normalized;
}
