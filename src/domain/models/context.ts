/**
 * State owned by a single inbound request. Created by the API key middleware
 * and dropped with the response; never shared between requests.
 */
export interface RequestContext {
  readonly apiKey: string;
  readonly path: string;
}

export type CredentialSource = "header" | "path";

export interface ResolvedCredentials {
  readonly apiKey: string;
  readonly path: string;
  readonly source: CredentialSource;
}
