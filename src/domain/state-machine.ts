import type { PaymentStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  requires_confirmation: ["authorized", "canceled"],
  authorized: ["captured", "canceled"],
  captured: ["refunded", "refund_failed"],
  refund_failed: ["refunded", "refund_failed"],
  refunded: [],
  canceled: [],
};

const TERMINAL_STATUSES: ReadonlySet<PaymentStatus> = new Set(["refunded", "canceled"]);

export type TransitionDecision =
  | { kind: "advance"; next: PaymentStatus }
  | { kind: "unchanged" }
  | { kind: "reject"; code: string; message: string };

export type ConfirmDecision = Extract<TransitionDecision, { kind: "advance" | "unchanged" }>;
export type CaptureDecision = Extract<TransitionDecision, { kind: "advance" | "reject" }>;

export type LifecycleOperation = "confirm" | "capture" | "refund" | "cancel";

function assertNever(value: never): never {
  throw new AppError("internal", "unhandled_lifecycle_value", `Unhandled lifecycle value '${String(value)}'.`);
}

export function canTransition(current: PaymentStatus, next: PaymentStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function assertTransition(current: PaymentStatus, next: PaymentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    "conflict",
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}

export function decideConfirm(status: PaymentStatus): ConfirmDecision {
  switch (status) {
    case "requires_confirmation":
      return { kind: "advance", next: "authorized" };
    case "authorized":
    case "captured":
    case "refunded":
    case "refund_failed":
    case "canceled":
      return { kind: "unchanged" };
    default:
      return assertNever(status);
  }
}

export function decideCapture(status: PaymentStatus): CaptureDecision {
  switch (status) {
    case "authorized":
      return { kind: "advance", next: "captured" };
    case "requires_confirmation":
    case "captured":
    case "refunded":
    case "refund_failed":
    case "canceled":
      return {
        kind: "reject",
        code: "payment_not_authorized",
        message: `Capture is not allowed when payment is '${status}'.`,
      };
    default:
      return assertNever(status);
  }
}

/**
 * The advance target is the optimistic outcome; the refund orchestrator
 * settles on `refunded` or `refund_failed` once the gateway answers.
 */
export function decideRefund(status: PaymentStatus): TransitionDecision {
  switch (status) {
    case "captured":
    case "refund_failed":
      return { kind: "advance", next: "refunded" };
    case "refunded":
    case "canceled":
      return { kind: "unchanged" };
    case "requires_confirmation":
    case "authorized":
      return {
        kind: "reject",
        code: "payment_not_captured",
        message: `Refund is not allowed when payment is '${status}'.`,
      };
    default:
      return assertNever(status);
  }
}

export function decideCancel(status: PaymentStatus): TransitionDecision {
  switch (status) {
    case "requires_confirmation":
    case "authorized":
      return { kind: "advance", next: "canceled" };
    case "canceled":
      return { kind: "unchanged" };
    case "captured":
    case "refunded":
    case "refund_failed":
      return {
        kind: "reject",
        code: "payment_not_cancelable",
        message: `Cancel is not allowed when payment is '${status}'.`,
      };
    default:
      return assertNever(status);
  }
}

export function decide(operation: LifecycleOperation, status: PaymentStatus): TransitionDecision {
  switch (operation) {
    case "confirm":
      return decideConfirm(status);
    case "capture":
      return decideCapture(status);
    case "refund":
      return decideRefund(status);
    case "cancel":
      return decideCancel(status);
    default:
      return assertNever(operation);
  }
}

export function rejectionError(decision: Extract<TransitionDecision, { kind: "reject" }>): AppError {
  return new AppError("conflict", decision.code, decision.message);
}
