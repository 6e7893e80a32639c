/**
 * HTTP plumbing shared by the geocoding and forecast clients
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { TransportError } from '../errors';

const BODY_SNIPPET_LENGTH = 200;

type ResponseLike = Pick<AxiosResponse, 'status' | 'data'>;

/**
 * The slice of an axios instance the clients use. Tests inject a jest.fn here.
 */
export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
}

/**
 * Create an axios instance with a fixed timeout that never rejects on status;
 * callers check the status through ensureSuccess.
 */
export function createHttpClient({ baseURL, timeoutMs }: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    validateStatus: () => true,
    headers: { Accept: 'application/json' },
  });
}

export function bodySnippet(data: unknown): string {
  if (data === undefined || data === null) return '';
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > BODY_SNIPPET_LENGTH ? `${text.slice(0, BODY_SNIPPET_LENGTH)}...` : text;
}

/**
 * Throw a TransportError carrying status and body snippet for non-2xx responses
 */
export function ensureSuccess<R extends ResponseLike>(response: R, url: string, provider: string): R {
  if (response.status < 200 || response.status >= 300) {
    const snippet = bodySnippet(response.data);
    throw new TransportError(
      `${provider} error (${response.status})${snippet ? `: ${snippet}` : ''}`,
      { url, status: response.status, bodySnippet: snippet || undefined }
    );
  }
  return response;
}

/**
 * Wrap a network-level failure (DNS, refused connection, timeout) as a TransportError
 */
export function toTransportError(error: unknown, url: string, provider: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
      ? 'request timed out'
      : error.message;
    return new TransportError(`${provider} request failed: ${reason}`, { url, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${provider} request failed: ${message}`, { url, cause: error });
}
