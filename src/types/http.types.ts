/** Cookie name -> value, as sent in a Cookie header. */
export type CookieMap = Record<string, string>;

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface TransportResponse {
  statusCode: number;
  body: string;
}

/**
 * Performs one GET. Must reject (with a `code` when known) on transport
 * failure; any status code is a resolved response.
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export interface AuthFetchOptions {
  /** Cookie domain; defaults to the URL host without "www." */
  domain?: string;
  /** Skip the cached cookies and re-extract from the browser first. */
  forceRefresh?: boolean;
  /** Body patterns meaning "this is a login page". Empty: never retried. */
  loginMarkers?: readonly RegExp[];
  timeoutMs?: number;
}

/**
 * What judges need from the network layer.
 */
export interface PageFetcher {
  fetchUrl(url: string, timeoutMs?: number): Promise<string>;
  fetchJson(url: string, timeoutMs?: number): Promise<unknown>;
  fetchUrlWithAuth(url: string, options?: AuthFetchOptions): Promise<string>;
}
