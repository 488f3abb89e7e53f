import cookie from '@fastify/cookie';
import formbody from '@fastify/formbody';
import fastify from 'fastify';

import {
  DEFAULT_MAX_SESSIONS,
  DEFAULT_SESSION_TIMEOUT,
} from '#constants/defaults';
import { registerOAuth2ErrorHandler } from '#errors';
import { createOAuth2Handler } from '#handler';
import { createLoggerConfig } from '#logging';
import { CookieSessionBinding } from '#session/binding';
import { MemorySessionStore } from '#session/store';

import type { FastifyInstance } from 'fastify';

import type { OAuth2HandlerOptions } from '#handler';

/** options of {@link createOAuth2Server} */
export interface OAuth2ServerOptions
  extends Omit<OAuth2HandlerOptions, 'sessions'> {
  /** session binding (default: cookie bound in-memory sessions, 30 minute timeout) */
  sessions?: CookieSessionBinding;
}

/**
 * creates a fastify server routing every request through the interceptor
 *
 * form bodies are parsed so that callback parameters may also arrive as a
 * form post, and interceptor errors are mapped to http responses.
 * @param options interceptor, downstream handler and optional session binding
 * @returns fastify instance, ready to `listen` or `inject`
 * @example
 * ```typescript
 * const server = createOAuth2Server({
 *   params: createOAuth2ParamsFromEnv(),
 *   client: new HttpAuthorizationServerClient({ log }),
 *   handler: async (request) => ({
 *     status: 200,
 *     headers: { 'content-type': 'text/plain' },
 *     body: `hello ${String(request.oauth2?.userinfo?.name)}`,
 *   }),
 *   log,
 * });
 *
 * await server.listen({ port: 8080 });
 * ```
 */
export function createOAuth2Server(
  options: OAuth2ServerOptions,
): FastifyInstance {
  const server = fastify({ logger: createLoggerConfig(options.log) });
  const sessions =
    options.sessions ??
    new CookieSessionBinding({
      store: new MemorySessionStore({
        sessionTimeout: DEFAULT_SESSION_TIMEOUT,
        maxSessions: DEFAULT_MAX_SESSIONS,
      }),
    });

  void server.register(cookie);
  void server.register(formbody);
  registerOAuth2ErrorHandler(server);

  server.all('/*', createOAuth2Handler({ ...options, sessions }));

  return server;
}
