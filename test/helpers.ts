import {
  ChannelMapper,
  ChargeRequest,
  ChargeResponse,
  DriverConstructor,
  DriverContext,
  InMemoryKeyValueCache,
  Logger,
  PaymentDriver,
  ProviderConfig,
  StatusNormalizer,
  VerificationResponse,
  WebhookPayload,
} from '../src';

export function createDriverContext(overrides: Partial<DriverContext> = {}): DriverContext {
  return {
    statusNormalizer: new StatusNormalizer(),
    channelMapper: new ChannelMapper(),
    healthCache: new InMemoryKeyValueCache<boolean>(),
    healthCheckTtlSeconds: 300,
    webhook: { toleranceSeconds: 300, requireTimestamp: false },
    ...overrides,
  };
}

export function createSilentLogger(): jest.Mocked<Logger> {
  return {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | null;
}

type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * Stub global fetch. Routes are "METHOD url-fragment" keys matched in order;
 * an unmatched request rejects like a network failure.
 */
export function stubFetch(routes: Record<string, RouteHandler>): { calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];

  jest.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    calls.push(request);

    for (const [route, handler] of Object.entries(routes)) {
      const [method, fragment] = route.split(' ');
      if (request.method === method && url.includes(fragment)) {
        return handler(request);
      }
    }

    throw new Error(`Unexpected request ${request.method} ${url}`);
  });

  return { calls };
}

export function jsonBody(request: RecordedRequest | undefined): unknown {
  return request?.body ? JSON.parse(request.body) : null;
}

export interface FakeDriverBehaviour {
  charge?: (request: ChargeRequest, provider: string) => Promise<ChargeResponse>;
  verify?: (id: string, provider: string) => Promise<VerificationResponse>;
  healthy?: boolean;
  currencies?: string[];
  validWebhook?: boolean;
}

/**
 * In-process driver whose behaviour the test controls
 */
export function createFakeDriver(behaviour: FakeDriverBehaviour = {}): DriverConstructor {
  return class FakeDriver implements PaymentDriver {
    constructor(
      readonly name: string,
      _config: ProviderConfig,
      private readonly context: DriverContext,
    ) {}

    async charge(request: ChargeRequest): Promise<ChargeResponse> {
      if (behaviour.charge) {
        return behaviour.charge(request, this.name);
      }
      return new ChargeResponse({
        reference: request.reference ?? `${this.name.toUpperCase()}_1700000000_00000000000000aa`,
        authorizationUrl: `https://pay.test/${this.name}`,
        accessCode: `${this.name}-session`,
        status: 'pending',
        provider: this.name,
      });
    }

    async verify(id: string): Promise<VerificationResponse> {
      if (behaviour.verify) {
        return behaviour.verify(id, this.name);
      }
      return new VerificationResponse({
        reference: id,
        status: 'success',
        amount: 100,
        currency: 'NGN',
        paidAt: '2026-01-01T00:00:00.000Z',
        channel: 'card',
        provider: this.name,
      });
    }

    async validateWebhook(): Promise<boolean> {
      return behaviour.validWebhook ?? true;
    }

    async healthCheck(): Promise<boolean> {
      return behaviour.healthy ?? true;
    }

    async getCachedHealthCheck(): Promise<boolean> {
      return this.context.healthCache.getOrCompute(
        `payments.health.${this.name}`,
        this.context.healthCheckTtlSeconds,
        () => this.healthCheck(),
      );
    }

    getSupportedCurrencies(): string[] {
      return behaviour.currencies ?? ['NGN', 'USD'];
    }

    isCurrencySupported(currency: string): boolean {
      return this.getSupportedCurrencies().includes(currency.toUpperCase());
    }

    extractWebhookReference(payload: WebhookPayload): string | null {
      return typeof payload.reference === 'string' ? payload.reference : null;
    }

    extractWebhookStatus(payload: WebhookPayload): string {
      return typeof payload.status === 'string' ? payload.status : 'unknown';
    }

    extractWebhookChannel(payload: WebhookPayload): string | null {
      return typeof payload.channel === 'string' ? payload.channel : null;
    }

    resolveVerificationId(reference: string, providerId: string | null): string {
      return providerId ?? reference;
    }
  };
}
