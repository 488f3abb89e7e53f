import type { AuthorizationServerClient } from '#client';
import type { OAuth2Params } from '#config';
import type { Log } from '#logging';
import type { StateGenerator } from '#state';

/**
 * options shared by the interceptor wrappers
 */
export interface InterceptorOptions {
  /** normalized configuration from `createOAuth2Params` */
  params: OAuth2Params;
  /** collaborator performing the calls to the authorization server */
  client: AuthorizationServerClient;
  /** optional logger */
  log?: Log;
  /** CSRF state source (default: 20 random alphanumeric characters) */
  generateState?: StateGenerator;
}

/** resolved interceptor options handed to every stage */
export interface InterceptorContext extends InterceptorOptions {
  generateState: StateGenerator;
}
