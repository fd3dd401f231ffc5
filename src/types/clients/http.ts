/**
 * HTTP client type definitions
 */

export interface HttpRequest {
  url: string;
  timeoutMs?: number;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}
