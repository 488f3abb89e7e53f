import { beforeEach, describe, expect, it, vi } from 'vitest';

import { NetworkError, ProtocolError, StateMismatchError } from '#errors';
import {
  createContext,
  createStages,
  wrapOAuth2,
  wrapRedirectUnauthenticated,
} from '#pipeline';

import {
  AUTHORIZE_URI,
  FIXED_STATE,
  LOGOUT_URI,
  TOKEN_INFO_URI,
  buildAuthRequest,
  createHandler,
  createOptions,
  createParams,
  createRequest,
  exchangeCodeForToken,
  fetchUserinfo,
  introspectToken,
  okResponse,
  refreshAccessToken,
  unusedResponse,
} from './fixtures';

import type { ExclusionInput } from '#exclusion';

const REDIRECT_LOCATION = `${AUTHORIZE_URI}?response_type=code&client_id=foo&state=${FIXED_STATE}`;

beforeEach(() => {
  vi.clearAllMocks();
});

describe('fn:wrapOAuth2', () => {
  describe('exclusion', () => {
    it.each<[string, ExclusionInput, string]>([
      ['a string', '/excluded', '/excluded'],
      ['a collection of strings', ['/health', '/metrics'], '/metrics'],
      ['a set of strings', new Set(['/health']), '/health'],
      ['a pattern', /\/public\/.*/, '/public/app.js'],
      ['a predicate', (uri) => uri.startsWith('/static'), '/static/logo.png'],
    ])(
      'should pass requests excluded by %s straight to the handler',
      async (_, exclude, uri) => {
        const handler = createHandler();
        const wrapped = wrapOAuth2(
          handler,
          createOptions(createParams({ exclude })),
        );
        const request = createRequest({
          uri,
          session: { oauth2: { accessToken: 'always invalid' } },
        });

        const response = await wrapped(request);

        expect(response).toBe(okResponse);
        expect(handler).toHaveBeenCalledWith(request);
        expect(introspectToken).not.toHaveBeenCalled();
      },
    );

    it('should let an excluded logout path reach the handler', async () => {
      const handler = createHandler();
      const wrapped = wrapOAuth2(
        handler,
        createOptions(createParams({ exclude: '/logout' })),
      );

      const response = await wrapped(createRequest({ uri: '/logout' }));

      expect(response).toBe(okResponse);
    });
  });

  describe('requests without token data', () => {
    it('should fall through to the handler unmodified', async () => {
      const handler = createHandler();
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(createRequest());

      expect(response).toBe(okResponse);
      expect(response.status).toBe(200);
      expect(introspectToken).not.toHaveBeenCalled();
    });

    it.each(['//[', '//evil.example.com/oauth/callback', '/%zz'])(
      'should pass the unusual path %s to the handler',
      async (uri) => {
        const handler = createHandler();
        const wrapped = wrapOAuth2(handler, createOptions(createParams()));

        const response = await wrapped(createRequest({ uri }));

        expect(response).toBe(okResponse);
        expect(handler).toHaveBeenCalledTimes(1);
      },
    );
  });

  describe('validation and refresh', () => {
    it('should keep valid token data in the session', async () => {
      introspectToken.mockResolvedValue(true);
      const handler = createHandler();
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(
        createRequest({ session: { oauth2: { accessToken: 'valid-token' } } }),
      );

      expect(introspectToken).toHaveBeenCalledWith(
        TOKEN_INFO_URI,
        'valid-token',
      );
      expect(handler).toHaveBeenCalledWith(
        expect.objectContaining({ oauth2: { accessToken: 'valid-token' } }),
      );
      expect(response).toEqual({
        ...okResponse,
        session: { oauth2: { accessToken: 'valid-token' } },
      });
    });

    it('should skip validation when no token info uri is configured', async () => {
      const handler = createHandler();
      const wrapped = wrapOAuth2(
        handler,
        createOptions(createParams({ tokenInfoUri: undefined })),
      );

      const response = await wrapped(
        createRequest({ session: { oauth2: { accessToken: 'opaque' } } }),
      );

      expect(introspectToken).not.toHaveBeenCalled();
      expect(response.session).toEqual({ oauth2: { accessToken: 'opaque' } });
    });

    it('should store refreshed token data in the session', async () => {
      introspectToken.mockResolvedValue(false);
      refreshAccessToken.mockResolvedValue({
        success: true,
        token: {
          access_token: 'sesame',
          refresh_token: 'new-foo',
          expires_in: 120,
        },
      });
      const handler = createHandler();
      const params = createParams();
      const wrapped = wrapOAuth2(handler, createOptions(params));

      const response = await wrapped(
        createRequest({
          session: {
            oauth2: { accessToken: 'always invalid', refreshToken: 'foo' },
          },
        }),
      );

      const refreshed = {
        accessToken: 'sesame',
        refreshToken: 'new-foo',
        params: { expires_in: 120, refresh_token: 'new-foo' },
      };
      expect(refreshAccessToken).toHaveBeenCalledWith('foo', params);
      expect(handler).toHaveBeenCalledWith(
        expect.objectContaining({ oauth2: refreshed }),
      );
      expect(response.session).toEqual({ oauth2: refreshed });
      expect(response).not.toHaveProperty('oauth2');
    });

    it('should redirect browsers to the authorization server when refresh fails', async () => {
      introspectToken.mockResolvedValue(false);
      refreshAccessToken.mockResolvedValue({
        success: false,
        error: { error: 'fail', error_description: 'Refresh token expired' },
      });
      const handler = createHandler(unusedResponse);
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(
        createRequest({
          headers: { Accept: 'text/html,application/xhtml+xml' },
          session: {
            oauth2: { accessToken: 'always invalid', refreshToken: 'foo' },
          },
        }),
      );

      expect(handler).not.toHaveBeenCalled();
      expect(response.status).toBe(302);
      expect(response.headers.Location).toBe(REDIRECT_LOCATION);
      expect(response.session).toEqual({
        oauth2: { accessToken: 'always invalid', refreshToken: 'foo' },
        state: FIXED_STATE,
        target: '/whatever',
      });
    });

    it('should answer other clients with a json error when refresh fails', async () => {
      introspectToken.mockResolvedValue(false);
      refreshAccessToken.mockResolvedValue({
        success: false,
        error: { error: 'fail', error_description: 'Refresh token expired' },
      });
      const handler = createHandler(unusedResponse);
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(
        createRequest({
          headers: { accept: 'application/json' },
          session: {
            oauth2: { accessToken: 'always invalid', refreshToken: 'foo' },
          },
        }),
      );

      expect(handler).not.toHaveBeenCalled();
      expect(response.status).toBe(400);
      expect(response.headers).toEqual({
        'Content-Type': 'application/json; charset=utf-8',
      });
      expect(response.body).toBe(
        '{"error":"Refresh token failed","errorcode":"refresh-token-failed"}',
      );
    });

    it('should fail the refresh locally when there is no refresh token', async () => {
      introspectToken.mockResolvedValue(false);
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams()),
      );

      const response = await wrapped(
        createRequest({ session: { oauth2: { accessToken: 'always invalid' } } }),
      );

      expect(refreshAccessToken).not.toHaveBeenCalled();
      expect(response.status).toBe(400);
    });

    it('should propagate network failures from introspection', async () => {
      introspectToken.mockRejectedValue(new NetworkError('connection refused'));
      const handler = createHandler();
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      await expect(
        wrapped(
          createRequest({ session: { oauth2: { accessToken: 'valid-token' } } }),
        ),
      ).rejects.toThrow(NetworkError);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('authorization callback', () => {
    it('should exchange the code and redirect to the stored target', async () => {
      const token = {
        accessToken: 'sesame',
        tokenType: 'bearer',
        expiresIn: 120,
        refreshToken: 'new-foo',
      };
      exchangeCodeForToken.mockResolvedValue(token);
      fetchUserinfo.mockImplementationOnce(async (data) => ({
        ...data,
        userinfo: { sub: 'user-1' },
      }));
      const handler = createHandler(unusedResponse);
      const params = createParams();
      const wrapped = wrapOAuth2(handler, createOptions(params));

      const response = await wrapped(
        createRequest({
          uri: '/oauth/callback',
          queryString: `code=abracadabra&state=${FIXED_STATE}`,
          params: { code: 'abracadabra', state: FIXED_STATE },
          session: { state: FIXED_STATE, target: '/protected?page=2' },
        }),
      );

      expect(exchangeCodeForToken).toHaveBeenCalledWith(
        params,
        { code: 'abracadabra', state: FIXED_STATE },
        {
          uri: REDIRECT_LOCATION,
          scope: ['foo', 'bar'],
          state: FIXED_STATE,
        },
      );
      expect(handler).not.toHaveBeenCalled();
      expect(response).toEqual({
        status: 302,
        headers: { Location: '/protected?page=2' },
        body: '',
        session: {
          state: FIXED_STATE,
          target: '/protected?page=2',
          oauth2: { ...token, userinfo: { sub: 'user-1' } },
        },
      });
    });

    it('should redirect to the root when no target was stored', async () => {
      exchangeCodeForToken.mockResolvedValue({ accessToken: 'sesame' });
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams()),
      );

      const response = await wrapped(
        createRequest({
          uri: '/oauth/callback',
          params: { code: 'abracadabra', state: FIXED_STATE },
          session: { state: FIXED_STATE },
        }),
      );

      expect(response.headers.Location).toBe('/');
    });

    it('should reject a callback whose state differs from the stored one', async () => {
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams()),
      );

      await expect(
        wrapped(
          createRequest({
            uri: '/oauth/callback',
            params: { code: 'abracadabra', state: 'forged' },
            session: { state: FIXED_STATE },
          }),
        ),
      ).rejects.toThrow(StateMismatchError);
      expect(exchangeCodeForToken).not.toHaveBeenCalled();
    });

    it('should reject a callback when no state was stored', async () => {
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams()),
      );

      await expect(
        wrapped(
          createRequest({
            uri: '/oauth/callback',
            params: { code: 'abracadabra', state: FIXED_STATE },
          }),
        ),
      ).rejects.toThrow(StateMismatchError);
    });

    it('should surface an error sent by the authorization server', async () => {
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams()),
      );

      const result = wrapped(
        createRequest({
          uri: '/oauth/callback',
          params: { error: 'access_denied', error_description: 'User denied' },
          session: { state: FIXED_STATE },
        }),
      );

      await expect(result).rejects.toThrow(ProtocolError);
      await expect(result).rejects.toMatchObject({
        error: 'access_denied',
        errorDescription: 'User denied',
      });
    });
  });

  describe('logout', () => {
    it('should redirect the client logout uri to the authorization server', async () => {
      const handler = createHandler(unusedResponse);
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(
        createRequest({
          uri: '/logout',
          session: { oauth2: { accessToken: 'valid-token' } },
        }),
      );

      expect(handler).not.toHaveBeenCalled();
      expect(introspectToken).not.toHaveBeenCalled();
      expect(response).toEqual({
        status: 302,
        headers: { Location: LOGOUT_URI },
        body: '',
      });
    });

    it('should match the logout path literally', async () => {
      const handler = createHandler();
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(createRequest({ uri: '/x/../logout' }));

      expect(response).toBe(okResponse);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should clear only the token data on the logout callback', async () => {
      const handler = createHandler(unusedResponse);
      const wrapped = wrapOAuth2(handler, createOptions(createParams()));

      const response = await wrapped(
        createRequest({
          uri: '/oauthpostlogout',
          session: { something: 'keep it', oauth2: { accessToken: 'x' } },
        }),
      );

      expect(handler).not.toHaveBeenCalled();
      expect(response.status).toBe(302);
      expect(response.headers.Location).toBe('/');
      expect(response.session).toEqual({ something: 'keep it' });
    });

    it('should delegate the logout callback to a custom handler', async () => {
      const logoutCallbackFn = vi.fn(async () => ({
        status: 303,
        headers: { Location: '/goodbye' },
      }));
      const wrapped = wrapOAuth2(
        createHandler(unusedResponse),
        createOptions(createParams({ logoutCallbackFn })),
      );
      const request = createRequest({ uri: '/oauthpostlogout' });

      const response = await wrapped(request);

      expect(logoutCallbackFn).toHaveBeenCalledWith(
        request,
        expect.objectContaining({ logoutCallbackUri: '/oauthpostlogout' }),
      );
      expect(response).toEqual({ status: 303, headers: { Location: '/goodbye' } });
    });
  });
});

describe('fn:createStages', () => {
  it('should order the stages from the outermost to the innermost', () => {
    const context = createContext(createOptions(createParams()));

    expect(createStages(context).map((stage) => stage.name)).toEqual([
      'logout',
      'logout-callback',
      'authorization-callback',
      'inject-oauth2-data',
      'validate-and-refresh',
    ]);
  });
});

describe('fn:wrapRedirectUnauthenticated', () => {
  it('should redirect unauthenticated requests and remember the target', async () => {
    const handler = createHandler(unusedResponse);
    const options = createOptions(createParams());
    const wrapped = wrapOAuth2(
      wrapRedirectUnauthenticated(handler, options),
      options,
    );

    const response = await wrapped(
      createRequest({ uri: '/protected', queryString: 'tab=1' }),
    );

    expect(handler).not.toHaveBeenCalled();
    expect(response).toEqual({
      status: 302,
      headers: { Location: REDIRECT_LOCATION },
      body: '',
      session: { state: FIXED_STATE, target: '/protected?tab=1' },
    });
  });

  it('should reuse the state already stored in the session', async () => {
    const options = createOptions(createParams());
    const wrapped = wrapRedirectUnauthenticated(
      createHandler(unusedResponse),
      options,
    );

    await wrapped(createRequest({ session: { state: 'existing-state' } }));

    expect(buildAuthRequest).toHaveBeenCalledWith(
      options.params,
      'existing-state',
    );
  });

  it('should let authenticated requests through', async () => {
    introspectToken.mockResolvedValue(true);
    const handler = createHandler();
    const options = createOptions(createParams());
    const wrapped = wrapOAuth2(
      wrapRedirectUnauthenticated(handler, options),
      options,
    );

    const response = await wrapped(
      createRequest({ session: { oauth2: { accessToken: 'valid-token' } } }),
    );

    expect(handler).toHaveBeenCalledOnce();
    expect(response.status).toBe(200);
  });

  it('should let excluded requests through', async () => {
    const handler = createHandler();
    const wrapped = wrapRedirectUnauthenticated(
      handler,
      createOptions(createParams({ exclude: '/public' })),
    );

    const response = await wrapped(createRequest({ uri: '/public' }));

    expect(response).toBe(okResponse);
  });
});
