/**
 * The next action the service implementation should take after calling
 * the `/auth/authorization` API.
 *
 * - `INTERNAL_SERVER_ERROR`: the request to the API was wrong or the API
 *   failed. Answer the client with 500.
 * - `BAD_REQUEST`: the authorization request is invalid. Answer with 400.
 * - `LOCATION`: the authorization request is invalid and the error goes to
 *   the redirect URI. Answer with 302.
 * - `FORM`: as `LOCATION`, but with `response_mode=form_post`. Answer with
 *   200 and the HTML in `responseContent`.
 * - `NO_INTERACTION`: valid request with `prompt=none`. Issue without UI.
 * - `INTERACTION`: valid request. Show the authorization UI.
 */
export type Action =
  | 'INTERNAL_SERVER_ERROR'
  | 'BAD_REQUEST'
  | 'LOCATION'
  | 'FORM'
  | 'NO_INTERACTION'
  | 'INTERACTION';

/** Values of the `display` request parameter (OpenID Connect Core 3.1.2.1). */
export type Display = 'PAGE' | 'POPUP' | 'TOUCH' | 'WAP';

/** The prompt the UI shown to the end-user must satisfy at least. */
export type Prompt = 'LOGIN' | 'CONSENT' | 'SELECT_ACCOUNT';

export type ClientType = 'PUBLIC' | 'CONFIDENTIAL';

export const ACTIONS: readonly Action[] = [
  'INTERNAL_SERVER_ERROR',
  'BAD_REQUEST',
  'LOCATION',
  'FORM',
  'NO_INTERACTION',
  'INTERACTION',
];

export const DISPLAYS: readonly Display[] = ['PAGE', 'POPUP', 'TOUCH', 'WAP'];

export const PROMPTS: readonly Prompt[] = ['LOGIN', 'CONSENT', 'SELECT_ACCOUNT'];

export const CLIENT_TYPES: readonly ClientType[] = ['PUBLIC', 'CONFIDENTIAL'];

/**
 * Fields carried by every response of the remote API.
 */
export interface ApiResponse {
  readonly resultCode: string | null;
  readonly resultMessage: string | null;
}

/** A scope (permission) registered on the service. */
export interface Scope {
  readonly name: string | null;
  readonly defaultEntry: boolean;
  readonly description: string | null;
}

/** The service (authorization server) configuration the request belongs to. */
export interface Service {
  readonly number: number;
  readonly serviceName: string | null;
  readonly issuer: string | null;
  readonly description: string | null;
}

/** The client application that made the authorization request. */
export interface Client {
  readonly number: number;
  readonly serviceNumber: number;
  readonly developer: string | null;
  /**
   * A 64-bit integer on the server. Values above `Number.MAX_SAFE_INTEGER`
   * (2^53 - 1) lose precision when the JSON body is parsed.
   */
  readonly clientId: number;
  readonly clientSecret: string | null;
  readonly clientType: ClientType | null;
  readonly clientName: string | null;
  readonly description: string | null;
  readonly redirectUris: readonly string[] | null;
}

/**
 * Request body of the `/auth/authorization` API.
 *
 * `parameters` is the query string of the authorization request the
 * end-user's browser sent, as-is (e.g. `response_type=code&client_id=57297408867`).
 */
export interface AuthorizationRequest {
  parameters: string;
  context?: string;
}
