import type { Logger } from 'pino';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { HttpError, NetworkError, ProtocolError, ServiceError, describeError } from '../errors.js';
import { REQUEST_TIMEOUT_MS } from '../config/constants.js';
import type { JsonObject, RateReply } from '../types/index.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type CallError = NetworkError | HttpError | ProtocolError | ServiceError;

export interface ExchangeClientOptions {
  apiKey: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

const envelopeSchema = z.object({
  error: z.string().nullable().optional(),
  data: z.unknown()
});

const rateDataSchema = z.object({
  from: z.string(),
  to: z.string(),
  rate: z.number(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/)
});

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeNetworkFailure(error: unknown, timeoutMs: number): string {
  const name = typeof error === 'object' && error !== null && 'name' in error ? error.name : undefined;
  if (name === 'TimeoutError' || name === 'AbortError') {
    return `Network error: request timed out after ${timeoutMs}ms`;
  }
  // undici reports "fetch failed" and keeps the socket error as the cause
  if (error instanceof Error && error.cause !== undefined) {
    return `Network error: ${error.message} (${describeError(error.cause)})`;
  }
  return `Network error: ${describeError(error)}`;
}

class ExchangeClient {
  private logger: Logger;
  private apiKey: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(logger: Logger, options: ExchangeClientOptions) {
    this.logger = logger;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Sends one query. The query itself travels in the URL, the API key in the
   * form body; the service only answers POST. Nothing is retried.
   */
  async call(url: string): Promise<Result<RateReply, CallError>> {
    this.logger.debug(`POST ${url}`);

    let response: Response;
    let rawText: string;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { Accept: 'application/json' },
        body: new URLSearchParams({ key: this.apiKey }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      rawText = await response.text();
    } catch (error) {
      return err(new NetworkError(describeNetworkFailure(error, this.timeoutMs), { cause: error }));
    }

    if (!response.ok) {
      return err(new HttpError(response.status, rawText.trim()));
    }

    this.logger.debug(`Received ${rawText.length} bytes from ${url}`);

    let payload: unknown;
    try {
      payload = JSON.parse(rawText);
    } catch (error) {
      return err(new ProtocolError('Invalid JSON response from service.', { cause: error }));
    }

    if (!isJsonObject(payload)) {
      return err(new ProtocolError('Unexpected payload structure.'));
    }
    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      return err(new ProtocolError('Unexpected payload structure.'));
    }

    const { error: serviceMessage, data } = envelope.data;
    if (serviceMessage) {
      return err(new ServiceError(serviceMessage));
    }

    const rate = rateDataSchema.safeParse(data);
    if (!rate.success) {
      return err(new ProtocolError('Response data is missing or malformed.'));
    }

    return ok({
      envelope: { error: '', data: rate.data },
      body: payload
    });
  }
}

export default ExchangeClient;
