/**
 * HTTP client abstraction. Every component that talks to a server takes one
 * of these so tests can substitute canned responses.
 */
export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export const USER_AGENT = "flakehub-push";

export const defaultHttpClient: HttpClient = {
  fetch: (url, options) => fetch(url, options),
};
