import {
  NetworkError,
  ProtocolError,
  StateMismatchError,
} from '@authgate/core';

import {
  ACCESS_TOKEN_PARAM,
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_JSON,
  GRANT_AUTHORIZATION_CODE,
  GRANT_PASSWORD,
  GRANT_REFRESH_TOKEN,
} from '#constants/http';
import { buildFormBody, createBasicAuthHeader } from '#form';
import {
  decodeResponseBody,
  toOAuth2Data,
  toOAuthError,
  toTokenResponse,
} from '#token';

import type {
  AuthRequest,
  AuthorizationServerClient,
  CallbackParams,
  ClientParams,
  JsonObject,
  Log,
  OAuth2Data,
  OAuthErrorWire,
  RefreshResult,
} from '@authgate/core';

/** configuration of the http authorization server client */
export interface HttpAuthorizationServerClientParams {
  /** custom fetch implementation for HTTP requests (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /** optional logger */
  log?: Log;
}

/** resource owner credentials for the password grant */
export interface PasswordCredentials {
  username: string;
  password: string;
}

/** decoded response of the authorization server */
interface ServerResponse {
  ok: boolean;
  status: number;
  body?: JsonObject;
}

/** error reported when a successful token response carries no token */
const MISSING_ACCESS_TOKEN: OAuthErrorWire = {
  error: 'invalid_response',
  error_description: 'Token response has no access_token',
};

/**
 * strips the query string of a uri so that no token ends up in a log
 * @param uri endpoint uri
 * @returns origin and path of the uri
 */
function describeEndpoint(uri: string): string {
  const { origin, pathname } = new URL(uri);

  return `${origin}${pathname}`;
}

/**
 * converts an OAuth error into the error thrown to the caller
 * @param error OAuth error in wire format
 * @returns protocol error carrying the same fields
 */
function toProtocolError(error: OAuthErrorWire): ProtocolError {
  return new ProtocolError(error.error, error.error_description, error.error_uri);
}

/**
 * authorization server client speaking the OAuth2 authorization code,
 * password and refresh grants over fetch
 *
 * client credentials are sent in the form body, or as http basic
 * credentials when `authorizationHeader` is set. token responses may be json
 * or form-encoded.
 * @example
 * ```typescript
 * const client = new HttpAuthorizationServerClient({ log });
 * const handler = wrapOAuth2(app, { params, client, log });
 * ```
 */
export class HttpAuthorizationServerClient
  implements AuthorizationServerClient
{
  /** fetch implementation used for every call */
  #fetch: typeof globalThis.fetch;
  /** optional logger */
  #log?: Log;

  /**
   * creates a new client
   * @param params client options
   */
  constructor(params: HttpAuthorizationServerClientParams = {}) {
    this.#fetch = params.fetch ?? fetch;
    this.#log = params.log;
  }

  public buildAuthRequest(params: ClientParams, state: string): AuthRequest {
    const url = new URL(params.authorizationUri);

    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', params.clientId);
    url.searchParams.set('redirect_uri', params.redirectUri);
    if (params.scope.length > 0) {
      url.searchParams.set('scope', params.scope.join(' '));
    }
    url.searchParams.set('state', state);

    return { uri: url.toString(), scope: params.scope, state };
  }

  public async exchangeCodeForToken(
    params: ClientParams,
    callbackParams: CallbackParams,
    authRequest: AuthRequest,
  ): Promise<OAuth2Data> {
    if (callbackParams.error) {
      throw new ProtocolError(
        callbackParams.error,
        callbackParams.errorDescription,
        callbackParams.errorUri,
      );
    }

    if (callbackParams.state !== authRequest.state) {
      throw new StateMismatchError();
    }

    if (!callbackParams.code) {
      throw new ProtocolError('invalid_request', 'Missing authorization code');
    }

    /* eslint-disable @typescript-eslint/naming-convention */
    const result = await this.#requestToken(params, {
      grant_type: GRANT_AUTHORIZATION_CODE,
      code: callbackParams.code,
      redirect_uri: params.redirectUri,
    });
    /* eslint-enable @typescript-eslint/naming-convention */

    if (!result.success) {
      throw toProtocolError(result.error);
    }

    return toOAuth2Data(result.token);
  }

  /**
   * obtains a token with the resource owner password grant
   * @param params client configuration
   * @param credentials resource owner credentials
   * @returns token data
   * @throws {ProtocolError} when the server rejects the credentials
   * @throws {NetworkError} when the server cannot be reached
   */
  public async getAccessToken(
    params: ClientParams,
    credentials: PasswordCredentials,
  ): Promise<OAuth2Data> {
    /* eslint-disable @typescript-eslint/naming-convention */
    const result = await this.#requestToken(params, {
      grant_type: GRANT_PASSWORD,
      username: credentials.username,
      password: credentials.password,
      scope: params.scope.length > 0 ? params.scope.join(' ') : undefined,
    });
    /* eslint-enable @typescript-eslint/naming-convention */

    if (!result.success) {
      throw toProtocolError(result.error);
    }

    return toOAuth2Data(result.token);
  }

  public async refreshAccessToken(
    refreshToken: string,
    params: ClientParams,
  ): Promise<RefreshResult> {
    /* eslint-disable @typescript-eslint/naming-convention */
    return this.#requestToken(params, {
      grant_type: GRANT_REFRESH_TOKEN,
      refresh_token: refreshToken,
    });
    /* eslint-enable @typescript-eslint/naming-convention */
  }

  public async introspectToken(
    tokenInfoUri: string,
    accessToken: string,
  ): Promise<boolean> {
    const url = new URL(tokenInfoUri);
    url.searchParams.set(ACCESS_TOKEN_PARAM, accessToken);

    const response = await this.#send(url.toString(), {
      method: 'GET',
      headers: { Accept: CONTENT_TYPE_JSON },
    });

    this.#log?.('debug', 'Token introspected', {
      endpoint: describeEndpoint(tokenInfoUri),
      status: response.status,
    });

    return response.ok;
  }

  public async fetchUserinfo(
    data: OAuth2Data,
    params: ClientParams,
  ): Promise<OAuth2Data> {
    if (!params.userinfoUri) {
      return data;
    }

    const response = await this.#send(params.userinfoUri, {
      method: 'GET',
      headers: {
        Accept: CONTENT_TYPE_JSON,
        Authorization: `Bearer ${data.accessToken}`,
      },
    });

    if (!response.ok || !response.body) {
      throw toProtocolError(toOAuthError(response.body, response.status));
    }

    return { ...data, userinfo: response.body };
  }

  /**
   * posts a grant to the token endpoint
   * @param params client configuration
   * @param grant grant specific form fields
   * @returns the token response on success, the OAuth error otherwise
   */
  async #requestToken(
    params: ClientParams,
    grant: Record<string, string | undefined>,
  ): Promise<RefreshResult> {
    const basic =
      params.authorizationHeader && params.clientSecret !== undefined
        ? createBasicAuthHeader(params.clientId, params.clientSecret)
        : undefined;

    /* eslint-disable @typescript-eslint/naming-convention */
    const body = buildFormBody({
      ...grant,
      client_id: basic ? undefined : params.clientId,
      client_secret: basic ? undefined : params.clientSecret,
    });
    /* eslint-enable @typescript-eslint/naming-convention */

    const response = await this.#send(params.accessTokenUri, {
      method: 'POST',
      headers: {
        'Content-Type': CONTENT_TYPE_FORM,
        'Accept': CONTENT_TYPE_JSON,
        ...(basic !== undefined && { Authorization: basic }),
      },
      body,
    });

    this.#log?.('debug', 'Token endpoint answered', {
      endpoint: describeEndpoint(params.accessTokenUri),
      grant: grant.grant_type,
      status: response.status,
    });

    if (!response.ok) {
      return {
        success: false,
        error: toOAuthError(response.body, response.status),
      };
    }

    const token = toTokenResponse(response.body);

    return token
      ? { success: true, token }
      : { success: false, error: MISSING_ACCESS_TOKEN };
  }

  /**
   * performs a request and decodes the response body
   * @param uri target uri
   * @param init request options
   * @returns status and decoded body
   * @throws {NetworkError} when the request or the body read fails
   */
  async #send(uri: string, init: RequestInit): Promise<ServerResponse> {
    try {
      const response = await this.#fetch(uri, init);
      const text = await response.text();

      return {
        ok: response.ok,
        status: response.status,
        body: decodeResponseBody(response.headers.get('content-type'), text),
      };
    } catch (error) {
      throw new NetworkError(
        `Request to ${describeEndpoint(uri)} failed`,
        error,
      );
    }
  }
}
