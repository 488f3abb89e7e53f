import type { JsonValue } from '#json';

/** per-request session map owned by the host framework */
export type Session = Record<string, unknown>;

/** parsed query or form parameters */
export type RequestParams = Record<string, string | string[] | undefined>;

/** request headers, looked up case-insensitively */
export type RequestHeaders = Record<string, string | string[] | undefined>;

/**
 * token data obtained from the authorization server and kept in the session
 */
export interface OAuth2Data {
  /** access token sent to resource servers */
  accessToken: string;
  /** token type as reported by the server (usually `bearer`) */
  tokenType?: string;
  /** lifetime in seconds, advisory only: every request is introspected */
  expiresIn?: number;
  /** refresh token used when introspection reports the token as invalid */
  refreshToken?: string;
  /** provider-specific fields of the token response */
  params?: Record<string, JsonValue>;
  /** user information fetched after the code exchange */
  userinfo?: Record<string, JsonValue>;
}

/**
 * framework-neutral view of an incoming http request
 */
export interface InterceptedRequest {
  /** request scheme */
  scheme: 'http' | 'https';
  /** host name without port */
  host: string;
  /** server port */
  port: number;
  /** request path, without the query string */
  uri: string;
  /** raw query string without the leading `?` */
  queryString?: string;
  /** request headers */
  headers: RequestHeaders;
  /** parsed query and form parameters */
  params: RequestParams;
  /** session loaded by the host for this request */
  session: Session;
  /** token data injected by the pipeline once authenticated */
  oauth2?: OAuth2Data;
}

/**
 * framework-neutral view of an outgoing http response
 */
export interface InterceptedResponse {
  /** http status code */
  status: number;
  /** response headers */
  headers: Record<string, string>;
  /** response body */
  body?: string;
  /**
   * session to persist in place of the request's session
   * @description when absent the host leaves the stored session untouched
   */
  session?: Session;
  /** refreshed token data for the data-injection stage to persist */
  oauth2?: OAuth2Data;
}

/** downstream request handler wrapped by the pipeline */
export type Handler = (
  request: InterceptedRequest,
) => Promise<InterceptedResponse>;

/**
 * authorization request sent to the authorization server
 */
export interface AuthRequest {
  /** full authorize uri including the query string */
  uri: string;
  /** requested scopes */
  scope: readonly string[];
  /** CSRF state carried through the redirect */
  state: string;
}

/**
 * parameters received on the authorization callback
 */
export interface CallbackParams {
  /** authorization code */
  code?: string;
  /** CSRF state echoed by the authorization server */
  state?: string;
  /** OAuth error code */
  error?: string;
  /** OAuth error description */
  errorDescription?: string;
  /** OAuth error documentation uri */
  errorUri?: string;
}

/* eslint-disable @typescript-eslint/naming-convention */
/**
 * token endpoint success response (OAuth wire format)
 */
export interface TokenResponseWire {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  [field: string]: JsonValue | undefined;
}

/**
 * token endpoint error response (OAuth wire format)
 */
export interface OAuthErrorWire {
  error: string;
  error_description?: string;
  error_uri?: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** outcome of a refresh attempt */
export type RefreshResult =
  | { success: true; token: TokenResponseWire }
  | { success: false; error: OAuthErrorWire };
