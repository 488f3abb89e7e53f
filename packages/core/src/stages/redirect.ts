import { HTTP_FOUND } from '#constants/http';
import { requestTarget } from '#request';

import type { InterceptorContext } from '#context';
import type { InterceptedRequest, InterceptedResponse } from '#types';

/**
 * redirects the user to the authorization server
 *
 * reuses the CSRF state already in the session, or generates one, and stores
 * it together with the uri to come back to after the callback.
 * @param request request that needs an authenticated user
 * @param context interceptor context
 * @returns 302 response to the authorize endpoint
 */
export function redirectToAuthorizationServer(
  request: InterceptedRequest,
  context: InterceptorContext,
): InterceptedResponse {
  const { params, client, log } = context;

  const state = params.getState(request) ?? context.generateState();
  const authRequest = client.buildAuthRequest(params, state);
  const target = requestTarget(request);

  log?.('debug', 'Redirecting to the authorization server', {
    uri: request.uri,
  });

  const response: InterceptedResponse = {
    status: HTTP_FOUND,
    headers: { Location: authRequest.uri },
    body: '',
    session: { ...request.session },
  };

  return params.putTarget(params.putState(response, state), target);
}
