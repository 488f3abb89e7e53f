import { HTTP_FOUND } from '#constants/http';
import { DEFAULT_TARGET } from '#constants/session';
import { ProtocolError, StateMismatchError, jsonifyError } from '#errors';
import { firstParam, pathOf } from '#request';

import type { InterceptorContext } from '#context';
import type { CallbackParams, InterceptedRequest } from '#types';

import type { Stage } from './stage';

/**
 * reads the OAuth parameters of the callback request
 * @param request callback request
 * @returns code, state and error fields
 */
export function readCallbackParams(request: InterceptedRequest): CallbackParams {
  return {
    code: firstParam(request.params, 'code'),
    state: firstParam(request.params, 'state'),
    error: firstParam(request.params, 'error'),
    errorDescription: firstParam(request.params, 'error_description'),
    errorUri: firstParam(request.params, 'error_uri'),
  };
}

/**
 * creates the stage completing the authorization code flow
 *
 * triggers on the path of the configured redirect uri, exchanges the code,
 * merges the user information and sends the user back to the stored target.
 * @param context interceptor context
 * @returns authorization callback stage
 */
export function createAuthorizationCallbackStage(
  context: InterceptorContext,
): Stage {
  const { params, client, log } = context;
  const callbackPath = pathOf(params.redirectUri);

  return {
    name: 'authorization-callback',
    matches: (request) => request.uri === callbackPath,
    handle: async (request) => {
      const callbackParams = readCallbackParams(request);

      try {
        if (callbackParams.error) {
          throw new ProtocolError(
            callbackParams.error,
            callbackParams.errorDescription,
            callbackParams.errorUri,
          );
        }

        const storedState = params.getState(request);
        if (!storedState || callbackParams.state !== storedState) {
          throw new StateMismatchError();
        }

        if (!callbackParams.code) {
          throw new ProtocolError(
            'invalid_request',
            'Missing authorization code',
          );
        }

        const authRequest = client.buildAuthRequest(params, storedState);
        const token = await client.exchangeCodeForToken(
          params,
          callbackParams,
          authRequest,
        );
        const data = await client.fetchUserinfo(token, params);

        log?.('info', 'Authorization code exchanged for an access token');

        return params.putOAuth2Data(
          request,
          {
            status: HTTP_FOUND,
            headers: { Location: params.getTarget(request) ?? DEFAULT_TARGET },
            body: '',
          },
          data,
        );
      } catch (error) {
        log?.('error', 'Authorization callback aborted', {
          error: jsonifyError(error),
        });

        throw error;
      }
    },
  };
}
