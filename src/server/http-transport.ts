import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';

export interface TransportResponse {
  status: number;
  statusText: string;
  /** Raw response body text. */
  body: string;
}

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * The HTTP capability the delivery client and the command executor use.
 * Every status code resolves; only a missing response (network failure,
 * timeout) rejects.
 */
export interface HttpTransport {
  get(request: TransportRequest): Promise<TransportResponse>;
  post(request: TransportRequest & { body: Buffer }): Promise<TransportResponse>;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return data === undefined || data === null ? '' : JSON.stringify(data);
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(defaults: CreateAxiosDefaults = {}) {
    this.client = axios.create({
      ...defaults,
      // Status classification belongs to the caller.
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      maxRedirects: 0
    });
  }

  async get(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.client.get<unknown>(request.url, {
      headers: request.headers,
      timeout: request.timeoutMs
    });
    return {
      status: response.status,
      statusText: response.statusText,
      body: bodyText(response.data)
    };
  }

  async post(request: TransportRequest & { body: Buffer }): Promise<TransportResponse> {
    const response = await this.client.post<unknown>(request.url, request.body, {
      headers: request.headers,
      timeout: request.timeoutMs
    });
    return {
      status: response.status,
      statusText: response.statusText,
      body: bodyText(response.data)
    };
  }
}
