import { ABSENT, formatValue, joinStrings, listScopeNames } from './summary-utils';
import { Action, ApiResponse, Client, Display, Prompt, Scope, Service } from './types';

/**
 * The fields of an `/auth/authorization` response, keyed by their wire names.
 */
export interface AuthorizationResponseFields extends ApiResponse {
  readonly action: Action | null;
  readonly service: Service | null;
  readonly client: Client | null;
  readonly display: Display | null;
  readonly maxAge: number;
  readonly scopes: readonly Scope[] | null;
  readonly uiLocales: readonly string[] | null;
  readonly claimsLocales: readonly string[] | null;
  readonly claims: readonly string[] | null;
  readonly acrEssential: boolean;
  readonly acrs: readonly string[] | null;
  readonly subject: string | null;
  readonly loginHint: string | null;
  readonly lowestPrompt: Prompt | null;
  readonly responseContent: string | null;
  readonly ticket: string | null;
}

/** Wire names in the order {@link AuthorizationResponse.toJSON} emits them. */
export const FIELD_NAMES = [
  'resultCode',
  'resultMessage',
  'action',
  'service',
  'client',
  'display',
  'maxAge',
  'scopes',
  'uiLocales',
  'claimsLocales',
  'claims',
  'acrEssential',
  'acrs',
  'subject',
  'loginHint',
  'lowestPrompt',
  'responseContent',
  'ticket',
] as const satisfies readonly (keyof AuthorizationResponseFields)[];

function freezeList<T>(list: readonly T[] | null | undefined): readonly T[] | null {
  return list ? Object.freeze([...list]) : null;
}

function freezeService(service: Service | null | undefined): Service | null {
  return service ? Object.freeze({ ...service }) : null;
}

function freezeClient(client: Client | null | undefined): Client | null {
  return client ? Object.freeze({ ...client, redirectUris: freezeList(client.redirectUris) }) : null;
}

function freezeScopes(scopes: readonly Scope[] | null | undefined): readonly Scope[] | null {
  return scopes ? Object.freeze(scopes.map((scope) => Object.freeze({ ...scope }))) : null;
}

export type AuthorizationResponseInit = Partial<AuthorizationResponseFields>;

/**
 * The JSON object exchanged with the remote API. Absent fields are omitted.
 */
export type AuthorizationResponseJson = {
  -readonly [K in keyof AuthorizationResponseFields]?: AuthorizationResponseFields[K];
};

/**
 * Response from the `/auth/authorization` API.
 *
 * The service implementation reads `action` and acts on it:
 *
 * - `INTERNAL_SERVER_ERROR`: reply `500 Internal Server Error`,
 *   `Content-Type: application/json`, `Cache-Control: no-store`,
 *   `Pragma: no-cache`, body = `responseContent` (a JSON error).
 * - `BAD_REQUEST`: the same with `400 Bad Request`.
 * - `LOCATION`: reply `302 Found` with `Location: <responseContent>`, a
 *   redirect URI that carries the `error` parameter.
 * - `FORM`: reply `200 OK`, `Content-Type: text/html;charset=UTF-8`, body =
 *   `responseContent`, an HTML page that posts the error to the client
 *   (OAuth 2.0 Form Post Response Mode).
 * - `NO_INTERACTION`: the request has `prompt=none`. Without showing any UI:
 *   1. If no end-user is logged in, call `/auth/authorization/fail` with
 *      `reason=NOT_LOGGED_IN`.
 *   2. If `maxAge` is not 0: when the authentication time of the end-user
 *      is not managed, fail with `MAX_AGE_NOT_SUPPORTED`; when
 *      `authTime + maxAge` is earlier than now, fail with `EXCEEDS_MAX_AGE`.
 *   3. If `subject` is set and differs from the current end-user, fail
 *      with `DIFFERENT_SUBJECT`.
 *   4. If `acrs` is set and the ACR of the current authentication is not in
 *      it, fail with `ACR_NOT_SATISFIED` when `acrEssential` is true.
 *   5. Call `/auth/authorization/issue` with `ticket`, the subject, the
 *      authentication time, the ACR and the claims listed in `claims` as a
 *      JSON object (localized per `claimsLocales`).
 * - `INTERACTION`: show the authorization UI, honoring `display`,
 *   `uiLocales`, `client` and `scopes`. Authenticate the end-user according
 *   to `lowestPrompt`: `SELECT_ACCOUNT` and `LOGIN` always show a login
 *   form, pre-filled with `subject` or else `loginHint`; `CONSENT` may reuse
 *   the current session when it matches `subject`, is younger than `maxAge`
 *   and satisfies `acrs`. When `acrEssential` is true the authentication
 *   must satisfy one of `acrs`. Then call `/auth/authorization/fail` with
 *   `reason=DENIED` or `/auth/authorization/issue`, as above.
 *
 * Instances are deeply frozen: sequences and nested records are copied on
 * construction. Use {@link AuthorizationResponse.with} to derive a modified
 * copy.
 */
export class AuthorizationResponse implements AuthorizationResponseFields {
  readonly resultCode: string | null;
  readonly resultMessage: string | null;
  readonly action: Action | null;
  readonly service: Service | null;
  readonly client: Client | null;
  readonly display: Display | null;
  /** Maximum authentication age in seconds. 0 means no constraint. */
  readonly maxAge: number;
  readonly scopes: readonly Scope[] | null;
  readonly uiLocales: readonly string[] | null;
  readonly claimsLocales: readonly string[] | null;
  readonly claims: readonly string[] | null;
  /** True when the `claims` request parameter marks `acr` as essential. */
  readonly acrEssential: boolean;
  readonly acrs: readonly string[] | null;
  /** The end-user the client expects, from the `sub` claim request. */
  readonly subject: string | null;
  readonly loginHint: string | null;
  readonly lowestPrompt: Prompt | null;
  /** JSON error, redirect URI or HTML, depending on `action`. */
  readonly responseContent: string | null;
  /** Passed to `/auth/authorization/issue` and `/auth/authorization/fail`. */
  readonly ticket: string | null;

  constructor(init: AuthorizationResponseInit = {}) {
    this.resultCode = init.resultCode ?? null;
    this.resultMessage = init.resultMessage ?? null;
    this.action = init.action ?? null;
    this.service = freezeService(init.service);
    this.client = freezeClient(init.client);
    this.display = init.display ?? null;
    this.maxAge = init.maxAge ?? 0;
    this.scopes = freezeScopes(init.scopes);
    this.uiLocales = freezeList(init.uiLocales);
    this.claimsLocales = freezeList(init.claimsLocales);
    this.claims = freezeList(init.claims);
    this.acrEssential = init.acrEssential ?? false;
    this.acrs = freezeList(init.acrs);
    this.subject = init.subject ?? null;
    this.loginHint = init.loginHint ?? null;
    this.lowestPrompt = init.lowestPrompt ?? null;
    this.responseContent = init.responseContent ?? null;
    this.ticket = init.ticket ?? null;
    Object.freeze(this);
  }

  /** The requested display mode, `PAGE` when the request did not specify one. */
  get displayOrDefault(): Display {
    return this.display ?? 'PAGE';
  }

  with(changes: AuthorizationResponseInit): AuthorizationResponse {
    return new AuthorizationResponse({ ...this.toFields(), ...changes });
  }

  /**
   * One-line description of every field, for logs.
   */
  summarize(): string {
    const client = this.client;
    return [
      `ticket=${formatValue(this.ticket)}`,
      `action=${formatValue(this.action)}`,
      `serviceNumber=${client ? client.serviceNumber : 0}`,
      `clientNumber=${client ? client.number : 0}`,
      `clientId=${client ? client.clientId : 0}`,
      `clientSecret=${client ? formatValue(client.clientSecret) : ABSENT}`,
      `clientType=${client ? formatValue(client.clientType) : ABSENT}`,
      `developer=${client ? formatValue(client.developer) : ABSENT}`,
      `display=${formatValue(this.display)}`,
      `maxAge=${this.maxAge}`,
      `scopes=${listScopeNames(this.scopes)}`,
      `uiLocales=${joinStrings(this.uiLocales)}`,
      `claimsLocales=${joinStrings(this.claimsLocales)}`,
      `claims=${joinStrings(this.claims)}`,
      `acrEssential=${this.acrEssential}`,
      `acrs=${joinStrings(this.acrs)}`,
      `subject=${formatValue(this.subject)}`,
      `loginHint=${formatValue(this.loginHint)}`,
      `lowestPrompt=${formatValue(this.lowestPrompt)}`,
    ].join(', ');
  }

  toJSON(): AuthorizationResponseJson {
    const json: AuthorizationResponseJson = {};
    const fields = this.toFields();
    for (const key of FIELD_NAMES) {
      const value = fields[key];
      if (value !== null) {
        Object.assign(json, { [key]: value });
      }
    }
    return json;
  }

  private toFields(): AuthorizationResponseFields {
    return {
      resultCode: this.resultCode,
      resultMessage: this.resultMessage,
      action: this.action,
      service: this.service,
      client: this.client,
      display: this.display,
      maxAge: this.maxAge,
      scopes: this.scopes,
      uiLocales: this.uiLocales,
      claimsLocales: this.claimsLocales,
      claims: this.claims,
      acrEssential: this.acrEssential,
      acrs: this.acrs,
      subject: this.subject,
      loginHint: this.loginHint,
      lowestPrompt: this.lowestPrompt,
      responseContent: this.responseContent,
      ticket: this.ticket,
    };
  }
}
