import { HTTP_BAD_REQUEST, JSON_CONTENT_TYPE } from '#constants/http';
import { RefreshFailure, jsonifyError } from '#errors';
import { acceptsHtml } from '#request';

import { redirectToAuthorizationServer } from './redirect';

import type { InterceptorContext } from '#context';
import type {
  InterceptedResponse,
  OAuth2Data,
  RefreshResult,
  TokenResponseWire,
} from '#types';

import type { Stage } from './stage';

/** body of the response sent to non-browser clients when refresh fails */
export const REFRESH_FAILED_BODY = {
  error: 'Refresh token failed',
  errorcode: 'refresh-token-failed',
} as const;

/**
 * merges a refresh response into the current token data
 *
 * `access_token` and `refresh_token` are lifted to their own fields, every
 * other returned field (including `refresh_token`) replaces `params`.
 * @param data current token data
 * @param token refresh response from the authorization server
 * @returns refreshed token data
 */
export function mergeRefreshedToken(
  data: OAuth2Data,
  token: TokenResponseWire,
): OAuth2Data {
  const { access_token: accessToken, ...fields } = token;

  const params: NonNullable<OAuth2Data['params']> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      params[key] = value;
    }
  }

  return {
    ...data,
    accessToken,
    refreshToken: token.refresh_token ?? data.refreshToken,
    params,
  };
}

/**
 * builds the response sent to non-browser clients when refresh fails
 * @returns 400 response with a json error body
 */
export function refreshFailedResponse(): InterceptedResponse {
  return {
    status: HTTP_BAD_REQUEST,
    headers: { 'Content-Type': JSON_CONTENT_TYPE },
    body: JSON.stringify(REFRESH_FAILED_BODY),
  };
}

/**
 * creates the stage validating the access token on every request
 *
 * an invalid token is refreshed; when refreshing fails browsers are sent
 * back to the authorization server and other clients get a 400.
 * @param context interceptor context
 * @returns validate-and-refresh stage
 */
export function createValidateStage(context: InterceptorContext): Stage {
  const { params, client, log } = context;

  /**
   * asks the authorization server for a new access token
   * @param data current token data
   * @returns refresh outcome, failing locally when there is no refresh token
   */
  const refresh = async (data: OAuth2Data): Promise<RefreshResult> =>
    data.refreshToken
      ? client.refreshAccessToken(data.refreshToken, params)
      : {
          success: false,
          error: {
            error: 'invalid_grant',
            error_description: 'No refresh token available',
          },
        };

  return {
    name: 'validate-and-refresh',
    matches: (request) =>
      request.oauth2 !== undefined && params.tokenInfoUri !== undefined,
    handle: async (request, next) => {
      const { oauth2: data } = request;
      const { tokenInfoUri } = params;
      if (!data || !tokenInfoUri) {
        return next(request);
      }

      if (await client.introspectToken(tokenInfoUri, data.accessToken)) {
        return next(request);
      }

      log?.('debug', 'Access token rejected, refreshing', { uri: request.uri });

      const result = await refresh(data);

      if (result.success) {
        const refreshed = mergeRefreshedToken(data, result.token);

        log?.('info', 'Access token refreshed');

        const response = await next({ ...request, oauth2: refreshed });

        return { ...response, oauth2: refreshed };
      }

      log?.('warn', 'Refresh token rejected', {
        error: jsonifyError(
          new RefreshFailure(
            result.error.error,
            result.error.error_description,
          ),
        ),
      });

      return acceptsHtml(request)
        ? redirectToAuthorizationServer(request, context)
        : refreshFailedResponse();
    },
  };
}
