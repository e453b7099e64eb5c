import type { HighlightBatch } from '../types.js';
import { DeliveryError } from '../errors.js';

export const READWISE_HIGHLIGHTS_URL = 'https://readwise.io/api/v2/highlights/';

export type DeliveryResult =
  | { ok: true; status: number }
  | { ok: false; error: DeliveryError };

export interface DeliveryClient {
  submit(batch: HighlightBatch, token: string): Promise<DeliveryResult>;
}

export interface ReadwiseClientOptions {
  endpoint?: string;
  fetch?: typeof fetch;
}

/**
 * Posts a whole batch to the Readwise highlights endpoint in one request.
 *
 * Single attempt, no timeout: a failure is returned as a result and the
 * caller decides what happens next.
 */
export class ReadwiseClient implements DeliveryClient {
  private endpoint: string;
  private fetchImpl: typeof fetch;

  constructor(options: ReadwiseClientOptions = {}) {
    this.endpoint = options.endpoint ?? READWISE_HIGHLIGHTS_URL;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async submit(batch: HighlightBatch, token: string): Promise<DeliveryResult> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Token ${token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(batch),
      });
    } catch (err) {
      return {
        ok: false,
        error: new DeliveryError(`Request to ${this.endpoint} failed`, { cause: err }),
      };
    }

    if (!res.ok) {
      const responseBody = await res.text().catch(() => undefined);
      return {
        ok: false,
        error: new DeliveryError(`HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`, {
          status: res.status,
          responseBody: responseBody || undefined,
        }),
      };
    }

    return { ok: true, status: res.status };
  }
}
