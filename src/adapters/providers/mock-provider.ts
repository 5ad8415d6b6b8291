import type {
  AuthorizeInput,
  AuthorizeResult,
  ProviderGatewayPort,
  RefundInput,
  RefundResult,
} from "../../ports/provider-gateway.js";

interface MockProviderOptions {
  name: string;
}

function hasPositiveAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount > 0;
}

/** Simulated gateway: approves whenever the amount is strictly positive. */
export class MockProviderGateway implements ProviderGatewayPort {
  public readonly name: string;

  constructor(options: MockProviderOptions) {
    this.name = options.name;
  }

  async authorize(input: AuthorizeInput): Promise<AuthorizeResult> {
    if (!hasPositiveAmount(input.amount)) {
      return { ok: false, failureReason: "invalid amount for authorization" };
    }
    return { ok: true };
  }

  async refund(input: RefundInput): Promise<RefundResult> {
    if (!hasPositiveAmount(input.amount)) {
      return { ok: false, failureReason: "invalid amount for refund" };
    }
    return { ok: true };
  }
}
