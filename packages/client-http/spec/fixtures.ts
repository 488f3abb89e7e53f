import { MockAgent, setGlobalDispatcher } from 'undici';

import type { ClientParams } from '@authgate/core';

// common test data

export const AUTH_SERVER = 'https://auth.example.com';
export const REDIRECT_URI = 'http://my.host/cb';

export const params: ClientParams = {
  clientId: 'foo',
  clientSecret: 'test-secret',
  scope: ['foo', 'bar'],
  authorizationUri: `${AUTH_SERVER}/auth`,
  accessTokenUri: `${AUTH_SERVER}/token`,
  redirectUri: REDIRECT_URI,
  userinfoUri: `${AUTH_SERVER}/userinfo`,
  authorizationHeader: false,
};

/* eslint-disable @typescript-eslint/naming-convention */
export const tokenResponse = {
  access_token: 'sesame',
  token_type: 'bearer',
  expires_in: 120,
  refresh_token: 'new-foo',
};
/* eslint-enable @typescript-eslint/naming-convention */

export const JSON_HEADERS = { 'content-type': 'application/json' };

/**
 * routes the global fetch through an in-process mock agent
 * @returns mock agent refusing every request it has no interceptor for
 */
export function createMockAgent(): MockAgent {
  const mockAgent = new MockAgent();
  mockAgent.disableNetConnect();
  setGlobalDispatcher(mockAgent);

  return mockAgent;
}
