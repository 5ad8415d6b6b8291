import { describe, expect, it } from "vitest";
import {
  assertTransition,
  canTransition,
  decide,
  decideCancel,
  decideCapture,
  decideConfirm,
  decideRefund,
  isTerminalStatus,
} from "../src/domain/state-machine.js";
import { PAYMENT_STATUSES } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";

describe("Payment state machine", () => {
  it("allows valid transitions", () => {
    expect(canTransition("requires_confirmation", "authorized")).toBe(true);
    expect(canTransition("requires_confirmation", "canceled")).toBe(true);
    expect(canTransition("authorized", "captured")).toBe(true);
    expect(canTransition("authorized", "canceled")).toBe(true);
    expect(canTransition("captured", "refunded")).toBe(true);
    expect(canTransition("captured", "refund_failed")).toBe(true);
    expect(canTransition("refund_failed", "refunded")).toBe(true);
    expect(canTransition("refund_failed", "refund_failed")).toBe(true);
  });

  it("blocks invalid transitions", () => {
    expect(canTransition("requires_confirmation", "captured")).toBe(false);
    expect(canTransition("captured", "canceled")).toBe(false);
    expect(canTransition("refunded", "refund_failed")).toBe(false);
    expect(canTransition("canceled", "authorized")).toBe(false);

    let caught: unknown;
    try {
      assertTransition("requires_confirmation", "captured");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ category: "conflict", code: "invalid_state_transition", statusCode: 409 });
  });

  it("marks terminal statuses", () => {
    expect(isTerminalStatus("refunded")).toBe(true);
    expect(isTerminalStatus("canceled")).toBe(true);
    expect(isTerminalStatus("refund_failed")).toBe(false);
    expect(isTerminalStatus("captured")).toBe(false);
  });

  it("confirms only pending intents and treats every later status as a replay", () => {
    expect(decideConfirm("requires_confirmation")).toEqual({ kind: "advance", next: "authorized" });
    for (const status of PAYMENT_STATUSES.filter((value) => value !== "requires_confirmation")) {
      expect(decideConfirm(status)).toEqual({ kind: "unchanged" });
    }
  });

  it("captures only authorized intents", () => {
    expect(decideCapture("authorized")).toEqual({ kind: "advance", next: "captured" });
    expect(decideCapture("captured")).toEqual({
      kind: "reject",
      code: "payment_not_authorized",
      message: "Capture is not allowed when payment is 'captured'.",
    });
  });

  it("refunds captured and failed refunds, replays settled ones, rejects uncaptured ones", () => {
    expect(decideRefund("captured")).toEqual({ kind: "advance", next: "refunded" });
    expect(decideRefund("refund_failed")).toEqual({ kind: "advance", next: "refunded" });
    expect(decideRefund("refunded")).toEqual({ kind: "unchanged" });
    expect(decideRefund("canceled")).toEqual({ kind: "unchanged" });
    expect(decideRefund("authorized")).toMatchObject({ kind: "reject", code: "payment_not_captured" });
  });

  it("cancels before capture only", () => {
    expect(decideCancel("requires_confirmation")).toEqual({ kind: "advance", next: "canceled" });
    expect(decideCancel("authorized")).toEqual({ kind: "advance", next: "canceled" });
    expect(decideCancel("canceled")).toEqual({ kind: "unchanged" });
    expect(decideCancel("refund_failed")).toMatchObject({ kind: "reject", code: "payment_not_cancelable" });
  });

  it("dispatches by operation", () => {
    expect(decide("confirm", "requires_confirmation")).toEqual(decideConfirm("requires_confirmation"));
    expect(decide("capture", "authorized")).toEqual(decideCapture("authorized"));
    expect(decide("refund", "captured")).toEqual(decideRefund("captured"));
    expect(decide("cancel", "authorized")).toEqual(decideCancel("authorized"));
  });
});
