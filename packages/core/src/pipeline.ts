import { isExcluded } from '#exclusion';
import { generateState } from '#state';

import { createAuthorizationCallbackStage } from '#stages/callback';
import { createInjectStage } from '#stages/inject';
import { createLogoutCallbackStage, createLogoutStage } from '#stages/logout';
import { redirectToAuthorizationServer } from '#stages/redirect';
import { createValidateStage } from '#stages/validate';

import type { InterceptorContext, InterceptorOptions } from '#context';
import type { Stage } from '#stages/stage';
import type {
  Handler,
  InterceptedRequest,
  InterceptedResponse,
} from '#types';

/**
 * resolves the defaults of the interceptor options
 * @param options interceptor options
 * @returns context handed to the stages
 */
export function createContext(options: InterceptorOptions): InterceptorContext {
  return { ...options, generateState: options.generateState ?? generateState };
}

/**
 * creates the interceptor stages, outermost first
 * @param context interceptor context
 * @returns ordered stages
 */
export function createStages(context: InterceptorContext): Stage[] {
  return [
    createLogoutStage(context),
    createLogoutCallbackStage(context),
    createAuthorizationCallbackStage(context),
    createInjectStage(context),
    createValidateStage(context),
  ];
}

/**
 * chains stages in front of a handler
 *
 * before each stage the exclusion rule is checked again, so an excluded
 * request always reaches the handler untouched. the first matching stage owns
 * the response; the stages below it only run if it calls `next`.
 * @param stages ordered stages, outermost first
 * @param handler downstream handler
 * @param context interceptor context
 * @returns handler running the stages
 */
export function composeStages(
  stages: readonly Stage[],
  handler: Handler,
  context: InterceptorContext,
): Handler {
  const { params, log } = context;

  const run = async (
    index: number,
    request: InterceptedRequest,
  ): Promise<InterceptedResponse> => {
    const stage = stages.at(index);

    if (!stage || isExcluded(request.uri, params.exclude)) {
      return handler(request);
    }

    if (!stage.matches(request)) {
      return run(index + 1, request);
    }

    log?.('trace', 'OAuth2 stage matched', {
      stage: stage.name,
      uri: request.uri,
    });

    return stage.handle(request, async (next) => run(index + 1, next));
  };

  return async (request) => run(0, request);
}

/**
 * wraps a handler with the OAuth2 interceptor
 *
 * handles the authorization callback and the local logout routes, exposes the
 * session's token data as `request.oauth2` after validating (and if needed
 * refreshing) it, and writes token data back into the response session.
 * requests without token data reach the handler unauthenticated; wrap the
 * handler with {@link wrapRedirectUnauthenticated} to require a login.
 * @param handler downstream handler
 * @param options interceptor options
 * @returns intercepted handler
 * @example
 * ```typescript
 * const app = wrapOAuth2(
 *   wrapRedirectUnauthenticated(handler, { params, client }),
 *   { params, client, log },
 * );
 * ```
 */
export function wrapOAuth2(
  handler: Handler,
  options: InterceptorOptions,
): Handler {
  const context = createContext(options);

  return composeStages(createStages(context), handler, context);
}

/**
 * redirects requests without token data to the authorization server
 *
 * meant for user-initiated requests, not for XHR. requires
 * {@link wrapOAuth2} around it so that `request.oauth2` is populated.
 * @param handler downstream handler
 * @param options interceptor options
 * @returns handler that only lets authenticated requests through
 */
export function wrapRedirectUnauthenticated(
  handler: Handler,
  options: InterceptorOptions,
): Handler {
  const context = createContext(options);
  const { params } = context;

  return async (request) =>
    !isExcluded(request.uri, params.exclude) && request.oauth2 === undefined
      ? redirectToAuthorizationServer(request, context)
      : handler(request);
}
