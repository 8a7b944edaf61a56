import { ComponentLogger } from '../common/logger';
import { DeliveryError, describeError } from '../common/errors';
import { SecurityProvider } from '../security/security-provider';
import { HttpTransport, TransportResponse } from './http-transport';

export type ResponseClass = 'success' | 'retryable' | 'fatal';

/**
 * Decides what a response means for the attempt loop.
 */
export class DeliveryPolicy {
  readonly maxAttempts: number;
  readonly successStatus: number;
  readonly fatalStatuses: ReadonlySet<number>;

  constructor(options: { maxAttempts?: number; successStatus?: number; fatalStatuses?: Iterable<number> } = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.successStatus = options.successStatus ?? 201;
    this.fatalStatuses = new Set(options.fatalStatuses ?? []);

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
  }

  /** `undefined` means no response arrived at all. */
  classify(status: number | undefined): ResponseClass {
    if (status === this.successStatus) {
      return 'success';
    }
    if (status !== undefined && this.fatalStatuses.has(status)) {
      return 'fatal';
    }
    return 'retryable';
  }
}

export type DeliveryResult =
  | { ok: true; status: number; attempts: number }
  | { ok: false; error: DeliveryError };

export interface DeliverOptions {
  /** Shown in log lines, e.g. "system log event". */
  label?: string;
  timeoutMs?: number;
}

/**
 * Pull the `detail` field out of an error body; fall back to the raw text.
 */
export function describeErrorBody(response: TransportResponse): string {
  const text = response.body.trim();
  if (text) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === 'object' && parsed !== null && 'detail' in parsed) {
        const detail = parsed.detail;
        return typeof detail === 'string' ? detail : JSON.stringify(detail, null, 4);
      }
    } catch {
      // not JSON, report the text itself
    }
    return text.length > 500 ? `${text.substring(0, 500)}... (truncated)` : text;
  }
  return response.statusText || 'no response body';
}

export class DeliveryClient {
  private logger: ComponentLogger;
  private security: SecurityProvider;
  private transport: HttpTransport;
  private policy: DeliveryPolicy;
  private timeoutMs: number;

  constructor(
    security: SecurityProvider,
    transport: HttpTransport,
    logger: ComponentLogger,
    options: { policy?: DeliveryPolicy; timeoutMs?: number } = {}
  ) {
    this.security = security;
    this.transport = transport;
    this.logger = logger;
    this.policy = options.policy ?? new DeliveryPolicy();
    this.timeoutMs = options.timeoutMs ?? 300000;
  }

  /**
   * Headers for a signed body. The signature covers exactly these bytes.
   */
  signedHeaders(payload: Buffer): Record<string, string> {
    return {
      ...this.security.authHeaders(),
      'Content-Type': 'application/json',
      Signature: this.security.sign(payload)
    };
  }

  /**
   * Serialize a value once and deliver those bytes.
   */
  async deliverJson(url: string, value: unknown, options: DeliverOptions = {}): Promise<DeliveryResult> {
    return this.deliver(url, Buffer.from(JSON.stringify(value), 'utf8'), options);
  }

  /**
   * POST the payload until the policy accepts a response or the attempt
   * ceiling is reached. Never throws; a failed delivery is logged and
   * returned.
   */
  async deliver(url: string, payload: Buffer, options: DeliverOptions = {}): Promise<DeliveryResult> {
    const label = options.label ?? 'payload';
    const headers = this.signedHeaders(payload);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    let lastStatus: number | undefined;
    let lastDetail: string | undefined;
    let attempts = 0;

    while (attempts < this.policy.maxAttempts) {
      attempts++;

      let response: TransportResponse | undefined;
      try {
        response = await this.transport.post({ url, headers, body: payload, timeoutMs });
      } catch (error) {
        response = undefined;
        lastStatus = undefined;
        lastDetail = describeError(error);
        this.logger.warn(`Failed to send the ${label}. No response.`, { url, attempt: attempts }, error);
      }

      const verdict = this.policy.classify(response?.status);
      if (response && verdict === 'success') {
        this.logger.debug(`Sent the ${label}`, { url, status: response.status, attempts });
        return { ok: true, status: response.status, attempts };
      }

      if (response) {
        lastStatus = response.status;
        lastDetail = describeErrorBody(response);
        this.logger.warn(`Failed to send the ${label}. Code: ${response.status} Reason: ${lastDetail}`, {
          url,
          attempt: attempts
        });
      }

      if (verdict === 'fatal') {
        break;
      }
    }

    const error = new DeliveryError(`Giving up on the ${label} after ${attempts} attempt(s)`, {
      url,
      attempts,
      status: lastStatus,
      detail: lastDetail
    });
    this.logger.error(`Dropped the ${label}`, error, { url, attempts, status: lastStatus, detail: lastDetail });
    return { ok: false, error };
  }
}
