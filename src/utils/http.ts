/**
 * HTTP client helpers for the remote embedding and extraction services
 */
import axios, { AxiosInstance } from 'axios';
import { ProviderError } from '../errors';

/**
 * The part of an axios instance the remote strategies use.
 * Tests pass an in-process fake with the same shape.
 */
export type HttpClient = Pick<AxiosInstance, 'post'>;

export interface HttpClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

/**
 * Create an axios instance with bearer authentication and a per-call timeout
 */
export function createHttpClient({ baseUrl, apiKey, timeoutMs }: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
  });
}

/**
 * Convert anything thrown by a remote call into a ProviderError
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderError(provider, `${provider} request timed out`, { cause: error });
    }

    const status = error.response?.status;
    const message = status
      ? `${provider} request failed with status ${status}`
      : `${provider} request failed: ${error.message}`;
    return new ProviderError(provider, message, { cause: error, status });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(provider, `${provider} request failed: ${message}`, { cause: error });
}

/**
 * Reject responses outside the 2xx range, for clients configured not to throw on them
 */
export function assertSuccessStatus(provider: string, status: number): void {
  if (status < 200 || status >= 300) {
    throw new ProviderError(provider, `${provider} request failed with status ${status}`, { status });
  }
}
