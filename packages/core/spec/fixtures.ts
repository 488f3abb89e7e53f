import { vi } from 'vitest';

import { createOAuth2Params } from '#config';

import type { Mock } from 'vitest';

import type { AuthorizationServerClient } from '#client';
import type { OAuth2Options, OAuth2Params } from '#config';
import type { InterceptorOptions } from '#context';
import type { Log } from '#logging';
import type {
  Handler,
  InterceptedRequest,
  InterceptedResponse,
  OAuth2Data,
} from '#types';

// common test data

export const AUTHORIZE_URI = 'https://auth.example.com/authorize';
export const TOKEN_URI = 'https://auth.example.com/token';
export const TOKEN_INFO_URI = 'https://auth.example.com/tokeninfo';
export const LOGOUT_URI = 'https://auth.example.com/logout';
export const REDIRECT_URI = 'https://app.example.com/oauth/callback';
export const FIXED_STATE = 'AbCdEfGhIjKlMnOpQrSt';

export const okResponse: InterceptedResponse = {
  status: 200,
  headers: {},
  body: 'ok',
};

export const unusedResponse: InterceptedResponse = {
  status: 500,
  headers: {},
  body: 'should not be invoked',
};

/**
 * creates interceptor configuration with test defaults
 * @param overrides options to override
 * @returns normalized configuration
 */
export function createParams(overrides?: Partial<OAuth2Options>): OAuth2Params {
  return createOAuth2Params({
    clientId: 'foo',
    clientSecret: 'test-secret',
    scope: ['foo', 'bar'],
    authorizationUri: AUTHORIZE_URI,
    accessTokenUri: TOKEN_URI,
    redirectUri: REDIRECT_URI,
    tokenInfoUri: TOKEN_INFO_URI,
    logoutUri: LOGOUT_URI,
    logoutUriClient: '/logout',
    logoutCallbackUri: '/oauthpostlogout',
    ...overrides,
  });
}

/**
 * creates an incoming request with test defaults
 * @param overrides request fields to override
 * @returns intercepted request
 */
export function createRequest(
  overrides?: Partial<InterceptedRequest>,
): InterceptedRequest {
  return {
    scheme: 'https',
    host: 'app.example.com',
    port: 443,
    uri: '/whatever',
    headers: {},
    params: {},
    session: {},
    ...overrides,
  };
}

// mocked collaborator

export const buildAuthRequest = vi.fn<
  AuthorizationServerClient['buildAuthRequest']
>((params, state) => ({
  uri: `${params.authorizationUri}?response_type=code&client_id=${params.clientId}&state=${state}`,
  scope: params.scope,
  state,
}));
export const exchangeCodeForToken =
  vi.fn<AuthorizationServerClient['exchangeCodeForToken']>();
export const refreshAccessToken =
  vi.fn<AuthorizationServerClient['refreshAccessToken']>();
export const introspectToken =
  vi.fn<AuthorizationServerClient['introspectToken']>();
export const fetchUserinfo = vi.fn<AuthorizationServerClient['fetchUserinfo']>(
  async (data) => data,
);

export const client: AuthorizationServerClient = {
  buildAuthRequest,
  exchangeCodeForToken,
  refreshAccessToken,
  introspectToken,
  fetchUserinfo,
};

export const log = vi.fn<Log>();

/**
 * creates interceptor options around the mocked collaborator
 * @param params interceptor configuration
 * @returns interceptor options with a fixed state generator
 */
export function createOptions(params: OAuth2Params): InterceptorOptions {
  return { params, client, log, generateState: () => FIXED_STATE };
}

/**
 * creates a downstream handler answering with a fixed response
 * @param response response to return
 * @returns mocked handler
 */
export function createHandler(
  response: InterceptedResponse = okResponse,
): Mock<Handler> {
  return vi.fn<Handler>(async () => response);
}

export const sampleData: OAuth2Data = {
  accessToken: 'valid-token',
};
