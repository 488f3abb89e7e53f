import { createOAuth2Params, wrapRedirectUnauthenticated } from '@authgate/core';
import { vi } from 'vitest';

import { createOAuth2Server } from '#server';
import { CookieSessionBinding } from '#session/binding';
import { MemorySessionStore } from '#session/store';

import type {
  AuthorizationServerClient,
  Handler,
  Log,
  OAuth2Options,
  OAuth2Params,
} from '@authgate/core';
import type { FastifyInstance } from 'fastify';

// common test data

export const AUTHORIZE_URI = 'https://auth.example.com/authorize';
export const TOKEN_URI = 'https://auth.example.com/token';
export const TOKEN_INFO_URI = 'https://auth.example.com/tokeninfo';
export const LOGOUT_URI = 'https://auth.example.com/logout';
export const REDIRECT_URI = 'http://localhost/oauth/callback';
export const FIXED_STATE = 'AbCdEfGhIjKlMnOpQrSt';
export const SESSION_ID = 'session-1';
export const SESSION_COOKIE = 'authgate.sid';

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
    exclude: '/health',
    ...overrides,
  });
}

// mocked collaborator

export const buildAuthRequest = vi.fn<
  AuthorizationServerClient['buildAuthRequest']
>((params, state) => ({
  uri: `${params.authorizationUri}?client_id=${params.clientId}&state=${state}`,
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

export const generateSessionId = vi.fn(() => SESSION_ID);

/** downstream handler greeting the authenticated user */
export const app = vi.fn<Handler>(async (request) => ({
  status: 200,
  headers: { 'content-type': 'text/plain' },
  body: `hello ${request.oauth2?.accessToken ?? 'anonymous'}`,
}));

/**
 * creates a server protecting {@link app} with the interceptor
 * @param options server options
 * @param options.client collaborator (default: the mocked one)
 * @param options.params interceptor configuration (default: test defaults)
 * @returns server and the store holding its sessions
 */
export function createTestServer(options?: {
  client?: AuthorizationServerClient;
  params?: OAuth2Params;
}): { server: FastifyInstance; store: MemorySessionStore } {
  const params = options?.params ?? createParams();
  const serverClient = options?.client ?? client;
  const store = new MemorySessionStore();
  const sessions = new CookieSessionBinding({
    store,
    generateId: generateSessionId,
  });

  const server = createOAuth2Server({
    params,
    client: serverClient,
    handler: wrapRedirectUnauthenticated(app, {
      params,
      client: serverClient,
      generateState: () => FIXED_STATE,
    }),
    sessions,
    log,
    generateState: () => FIXED_STATE,
  });

  return { server, store };
}
