export interface AuthorizeInput {
  paymentIntentId: string;
  amount: number;
  currency: string;
}

export interface AuthorizeResult {
  ok: boolean;
  failureReason?: string;
}

export interface RefundInput {
  paymentIntentId: string;
  chargeId: string | null;
  amount: number;
  currency: string;
}

export interface RefundResult {
  ok: boolean;
  failureReason?: string;
}

export interface ProviderGatewayPort {
  readonly name: string;
  authorize(input: AuthorizeInput): Promise<AuthorizeResult>;
  refund(input: RefundInput): Promise<RefundResult>;
}
