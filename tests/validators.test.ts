import { describe, expect, it } from "vitest";
import {
  normalizeIdempotencyKey,
  parseAmount,
  parseUpdatePaymentIntentInput,
  requireResourceId,
} from "../src/api/validators.js";

describe("normalizeIdempotencyKey", () => {
  it("treats a missing or blank header as no key", () => {
    expect(normalizeIdempotencyKey({}, 128)).toBeUndefined();
    expect(normalizeIdempotencyKey({ "idempotency-key": "   " }, 128)).toBeUndefined();
  });

  it("trims a valid key", () => {
    expect(normalizeIdempotencyKey({ "idempotency-key": " order_1:create.v2 " }, 128)).toBe("order_1:create.v2");
  });

  it("rejects repeated, oversized and malformed keys", () => {
    expect(() => normalizeIdempotencyKey({ "idempotency-key": ["K1", "K2"] }, 128)).toThrowError(
      "Idempotency-Key must be sent once.",
    );
    expect(() => normalizeIdempotencyKey({ "idempotency-key": "k".repeat(129) }, 128)).toThrowError(
      "Idempotency-Key length must be <= 128.",
    );
    expect(() => normalizeIdempotencyKey({ "idempotency-key": "white space" }, 128)).toThrowError(
      "Idempotency-Key contains invalid characters.",
    );
  });
});

describe("parseAmount", () => {
  it("accepts numbers and numeric strings including zero", () => {
    expect(parseAmount(0)).toBe(0);
    expect(parseAmount(100)).toBe(100);
    expect(parseAmount(" 42.50 ")).toBe(42.5);
  });

  it("rejects negatives and non-numeric values", () => {
    for (const value of [-1, "-3", "abc", Number.NaN, Number.POSITIVE_INFINITY, null, true]) {
      expect(() => parseAmount(value)).toThrowError("Amount must be a non-negative number.");
    }
  });
});

describe("requireResourceId", () => {
  it("trims ids and rejects empty ones", () => {
    expect(requireResourceId(" pi_1 ", "Payment id")).toBe("pi_1");
    expect(() => requireResourceId(" ", "Payment id")).toThrowError(
      "Payment id length must be between 1 and 255 characters.",
    );
    expect(() => requireResourceId(undefined, "Payment id")).toThrowError("Payment id is required.");
  });
});

describe("parseUpdatePaymentIntentInput", () => {
  it("accepts a camelCase order id", () => {
    expect(parseUpdatePaymentIntentInput({ orderId: "order_3", amount: 5 }, "pi_1", "INR")).toEqual({
      order_id: "order_3",
      amount: 5,
      currency: "INR",
    });
  });

  it("prefers order_id when both spellings are sent", () => {
    const input = parseUpdatePaymentIntentInput({ order_id: "order_4", orderId: "order_5", amount: 5 }, "pi_1", "INR");
    expect(input.order_id).toBe("order_4");
  });
});
