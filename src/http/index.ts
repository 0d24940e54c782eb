export { HttpClient, gotTransport, looksLikeLoginPage, toCookieHeader } from './http-client.js';
export type { HttpClientOptions } from './http-client.js';
