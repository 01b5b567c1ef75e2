import { ConnectorError, errorMessage } from '../errors';
import { ConnectorSource } from './types';

export interface BasicCredentials {
  username: string;
  secret: string;
}

export function basicAuthHeader(creds: BasicCredentials): string {
  return `Basic ${Buffer.from(`${creds.username}:${creds.secret}`).toString('base64')}`;
}

export function joinUrl(baseUrl: string, endpoint: string, params?: Record<string, string>): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
  if (!params || Object.keys(params).length === 0) return url;
  return `${url}?${new URLSearchParams(params).toString()}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * fetch() a JSON endpoint and return the parsed object body.
 * Transport failures, aborts, non-2xx statuses and non-object bodies are all
 * raised as ConnectorError tagged with the source.
 */
export async function requestJson(
  source: ConnectorSource,
  url: string,
  init: RequestInit,
): Promise<Record<string, unknown>> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (err) {
    const aborted = err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
    throw new ConnectorError(source, aborted ? 'request aborted' : `request failed: ${errorMessage(err)}`);
  }

  if (!response.ok) {
    throw new ConnectorError(source, `HTTP ${response.status}`, response.status);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new ConnectorError(source, 'response body is not JSON', response.status);
  }

  if (!isRecord(body)) {
    throw new ConnectorError(source, 'unexpected response shape', response.status);
  }
  return body;
}
