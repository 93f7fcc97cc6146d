/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET";

export type HttpRedirectMode = "follow" | "manual" | "error";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Redirect handling passed to fetch. Default: "follow" */
  redirect?: HttpRedirectMode;
}

/**
 * A successful (2xx) response with its body decoded as text
 */
export interface HttpResponse {
  status: number;
  url: string;
  body: string;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Signature of the request function injected into clients
 * (production: httpRequest, tests: the mock harness)
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpResponse>;
