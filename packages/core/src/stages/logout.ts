import { HTTP_FOUND } from '#constants/http';
import { ConfigurationError } from '#errors';
import { pathOf } from '#request';

import type { InterceptorContext } from '#context';

import type { Stage } from './stage';

/**
 * reads the path of a configured local route
 * @param uri configured route, if any
 * @returns path component, undefined when the route is not configured
 */
function routePath(uri?: string): string | undefined {
  return uri === undefined ? undefined : pathOf(uri);
}

/**
 * creates the stage sending the user to the authorization server's logout
 * endpoint
 *
 * the session is left untouched, the logout callback clears it.
 * @param context interceptor context
 * @returns logout stage
 */
export function createLogoutStage(context: InterceptorContext): Stage {
  const { params, log } = context;
  const logoutPath = routePath(params.logoutUriClient);

  return {
    name: 'logout',
    matches: (request) => request.uri === logoutPath,
    handle: async () => {
      if (!params.logoutUri) {
        throw new ConfigurationError(
          'OAuth2 config: logoutUri is required when logoutUriClient is set',
        );
      }

      log?.('debug', 'Redirecting to the authorization server logout');

      return {
        status: HTTP_FOUND,
        headers: { Location: params.logoutUri },
        body: '',
      };
    },
  };
}

/**
 * creates the stage handling the redirect back from the authorization
 * server's logout endpoint
 * @param context interceptor context
 * @returns logout callback stage
 */
export function createLogoutCallbackStage(context: InterceptorContext): Stage {
  const { params, log } = context;
  const logoutCallbackPath = routePath(params.logoutCallbackUri);

  return {
    name: 'logout-callback',
    matches: (request) => request.uri === logoutCallbackPath,
    handle: async (request) => {
      log?.('debug', 'Handling the logout callback');

      return params.logoutCallbackFn(request, params);
    },
  };
}
