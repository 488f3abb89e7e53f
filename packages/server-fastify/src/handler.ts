import { wrapOAuth2 } from '@authgate/core';

import { toInterceptedRequest } from '#request-context';

import type {
  AuthorizationServerClient,
  Handler,
  Log,
  OAuth2Params,
  StateGenerator,
} from '@authgate/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type { CookieSessionBinding } from '#session/binding';

/** options of {@link createOAuth2Handler} */
export interface OAuth2HandlerOptions {
  /** normalized configuration from `createOAuth2Params` */
  params: OAuth2Params;
  /** collaborator performing the calls to the authorization server */
  client: AuthorizationServerClient;
  /** downstream handler answering the requests that pass the interceptor */
  handler: Handler;
  /** binding between requests and their sessions */
  sessions: CookieSessionBinding;
  /** optional logger */
  log?: Log;
  /** CSRF state source (default: 20 random alphanumeric characters) */
  generateState?: StateGenerator;
}

/** fastify route handler running the interceptor */
export type OAuth2RouteHandler = (
  request: FastifyRequest,
  reply: FastifyReply,
) => Promise<FastifyReply>;

/**
 * creates a fastify route handler running the OAuth2 interceptor
 *
 * the session is loaded through the binding before the pipeline runs and
 * replaced by `response.session` when the pipeline returns one. the session
 * id is regenerated when that response signs the user in.
 * @param options interceptor, downstream handler and session binding
 * @returns route handler for `server.all`
 */
export function createOAuth2Handler(
  options: OAuth2HandlerOptions,
): OAuth2RouteHandler {
  const { params, client, handler, sessions, log, generateState } = options;
  const intercepted = wrapOAuth2(handler, {
    params,
    client,
    log,
    generateState,
  });

  return async (request, reply) => {
    const loaded = await sessions.load(request);
    const interceptedRequest = toInterceptedRequest(request, loaded.session);
    const response = await intercepted(interceptedRequest);

    if (response.session) {
      // sign-in always moves the session to a new id
      const signedIn =
        params.getOAuth2Data(interceptedRequest) === undefined &&
        params.getOAuth2Data({
          ...interceptedRequest,
          session: response.session,
        }) !== undefined;

      await sessions.save(reply, loaded, response.session, {
        regenerate: signedIn,
      });
    }

    return reply
      .code(response.status)
      .headers(response.headers)
      .send(response.body ?? '');
  };
}
