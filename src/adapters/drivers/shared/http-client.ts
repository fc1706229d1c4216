export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface HttpRequestOptions {
  query?: Record<string, string | number | undefined>;
  json?: unknown;
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * Non-2xx response, or a transport failure (status 0)
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown = null,
  ) {
    super(message);
    this.name = 'HttpError';
  }

  get isServerError(): boolean {
    return this.status === 0 || this.status >= 500;
  }
}

/**
 * Minimal JSON client over global fetch with a per-call timeout
 */
export class HttpClient {
  constructor(private readonly options: HttpClientOptions) {}

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  async get(path: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    return this.request('GET', path, options);
  }

  async post(path: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    return this.request('POST', path, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.options.headers,
      ...options.headers,
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      headers['Content-Type'] = 'application/json';
    } else if (options.form) {
      body = new URLSearchParams(options.form).toString();
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new HttpError(`${method} ${url} failed: ${reason}`, 0);
    } finally {
      clearTimeout(timeoutId);
    }

    const data = await parseBody(response);

    if (!response.ok) {
      throw new HttpError(
        `${method} ${url} responded ${response.status}${describeError(data)}`,
        response.status,
        data,
      );
    }

    return { status: response.status, data };
  }

  private buildUrl(path: string, query?: HttpRequestOptions['query']): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const url = /^https?:\/\//.test(path) ? path : `${base}/${path.replace(/^\/+/, '')}`;

    if (!query) {
      return url;
    }

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();
    return search ? `${url}${url.includes('?') ? '&' : '?'}${search}` : url;
  }
}

async function parseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeError(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'message' in data) {
    const { message } = data;
    if (typeof message === 'string') {
      return `: ${message}`;
    }
  }
  return '';
}
