export interface ChargeResponseInit {
  reference: string;
  authorizationUrl: string;
  accessCode: string;
  status: string;
  provider: string;
  metadata?: Record<string, unknown>;
}

const SUCCESS_TOKENS = ['success', 'succeeded', 'completed', 'successful'];

/**
 * Result of initializing a charge with a provider
 */
export class ChargeResponse {
  readonly reference: string;
  /** Where the payer completes payment */
  readonly authorizationUrl: string;
  /** Provider-issued session, order or payment id */
  readonly accessCode: string;
  /** Provider-native status at creation time */
  readonly status: string;
  readonly provider: string;
  readonly metadata: Record<string, unknown>;

  constructor(init: ChargeResponseInit) {
    this.reference = init.reference;
    this.authorizationUrl = init.authorizationUrl;
    this.accessCode = init.accessCode;
    this.status = init.status;
    this.provider = init.provider;
    this.metadata = { ...(init.metadata ?? {}) };
    Object.freeze(this);
  }

  isSuccessful(): boolean {
    return SUCCESS_TOKENS.includes(this.status.toLowerCase());
  }

  isPending(): boolean {
    return this.status.toLowerCase() === 'pending';
  }
}
