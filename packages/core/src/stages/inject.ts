import type { InterceptorContext } from '#context';

import type { Stage } from './stage';

/**
 * creates the stage exposing the session's token data to the downstream
 * handler as `request.oauth2` and writing it back into the response session
 *
 * token data stamped on the response by the refresh flow wins over the data
 * read from the session.
 * @param context interceptor context
 * @returns data injection stage
 */
export function createInjectStage(context: InterceptorContext): Stage {
  const { params } = context;

  return {
    name: 'inject-oauth2-data',
    matches: (request) => params.getOAuth2Data(request) !== undefined,
    handle: async (request, next) => {
      const data = params.getOAuth2Data(request);
      if (!data) {
        return next(request);
      }

      const { oauth2: refreshed, ...response } = await next({
        ...request,
        oauth2: data,
      });

      return params.putOAuth2Data(request, response, refreshed ?? data);
    },
  };
}
