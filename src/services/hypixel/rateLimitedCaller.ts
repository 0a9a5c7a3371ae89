/**
 * Rate-limited GET caller
 * Every remote call in the extractor goes through one of these. Each attempt
 * is followed by a fixed delay to stay under the service's request ceiling,
 * and failed attempts are retried with a growing backoff.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import {
  ApiError,
  ApiLogicError,
  AppError,
  TransportError,
  errorMessage,
  isRecord
} from '../../utils/errorHandler';
import type { Reporter } from '../../utils/reporter';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after failed attempt number `attempt` (1-based). */
  backoffMs: (attempt: number) => number;
  isRetryable: (error: AppError) => boolean;
}

export interface RetryPolicyOptions {
  backoffUnitMs?: number;
  /** HTTP statuses that fail at once instead of using up the budget. */
  noRetryStatuses?: readonly number[];
}

/**
 * Retries every failed attempt up to `maxAttempts`, waiting
 * `attempt * backoffUnitMs` in between.
 */
export function createRetryPolicy(maxAttempts: number = 3, options: RetryPolicyOptions = {}): RetryPolicy {
  const backoffUnitMs = options.backoffUnitMs ?? 2000;
  const noRetry = new Set(options.noRetryStatuses ?? []);

  return {
    maxAttempts,
    backoffMs: attempt => attempt * backoffUnitMs,
    isRetryable: error => error.statusCode === undefined || !noRetry.has(error.statusCode)
  };
}

/** Anything that can fetch one endpoint as JSON. */
export interface JsonCaller {
  call(endpoint: string, context?: string): Promise<unknown>;
}

export interface RateLimitedCallerOptions {
  client: AxiosInstance;
  userAgent: string;
  apiKey?: string;
  requestDelayMs: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  reporter?: Reporter;
}

export class RateLimitedCaller implements JsonCaller {
  private client: AxiosInstance;
  private headers: Record<string, string>;
  private requestDelayMs: number;
  private retryPolicy: RetryPolicy;
  private sleep: Sleep;
  private reporter?: Reporter;

  constructor(options: RateLimitedCallerOptions) {
    this.client = options.client;
    this.requestDelayMs = options.requestDelayMs;
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy();
    this.sleep = options.sleep ?? realSleep;
    this.reporter = options.reporter;

    this.headers = {
      'Accept': 'application/json',
      'User-Agent': options.userAgent
    };
    if (options.apiKey) {
      this.headers['API-Key'] = options.apiKey;
    }
  }

  /**
   * GET `endpoint` (relative to the client's base URL) and return the parsed
   * body. Throws ApiError once `maxAttempts` attempts have failed.
   */
  async call(
    endpoint: string,
    context: string = 'API call',
    maxAttempts: number = this.retryPolicy.maxAttempts
  ): Promise<unknown> {
    let lastError: AppError = new TransportError('no attempt made');
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;

      try {
        const data = await this.attempt(endpoint);
        await this.sleep(this.requestDelayMs);
        return data;
      } catch (error) {
        await this.sleep(this.requestDelayMs);
        lastError = error instanceof AppError ? error : new TransportError(errorMessage(error));
      }

      if (!this.retryPolicy.isRetryable(lastError) || attempt >= maxAttempts) {
        break;
      }

      const backoff = this.retryPolicy.backoffMs(attempt);
      this.reporter?.warning(
        `${context}: attempt ${attempt}/${maxAttempts} failed (${lastError.message}), retrying in ${backoff / 1000}s`
      );
      await this.sleep(backoff);
    }

    throw new ApiError(context, lastError, attempt);
  }

  /**
   * One HEAD request against the base URL. True when the host answered at
   * all, whatever the status.
   */
  async ping(timeoutMs: number = 5000): Promise<boolean> {
    try {
      await this.client.head('', {
        headers: { 'User-Agent': this.headers['User-Agent'] },
        timeout: timeoutMs,
        validateStatus: () => true
      });
      return true;
    } catch {
      return false;
    }
  }

  private async attempt(endpoint: string): Promise<unknown> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.client.get<unknown>(endpoint, { headers: this.headers });
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const { status, data } = error.response;
        const cause = causeOf(data);
        throw new ApiLogicError(cause ? `HTTP ${status}: ${cause}` : `HTTP ${status}`, status);
      }
      throw new TransportError(errorMessage(error));
    }

    const body = response.data;
    if (isRecord(body) && body.success === false) {
      throw new ApiLogicError(causeOf(body) ?? 'API reported success: false', response.status);
    }

    return body;
  }
}

// Hypixel puts the reason in `cause`, Mojang in `errorMessage`
function causeOf(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  if (typeof data.cause === 'string') return data.cause;
  if (typeof data.errorMessage === 'string') return data.errorMessage;
  return undefined;
}
