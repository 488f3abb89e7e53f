export type {
  CookieSessionBindingOptions,
  LoadedSession,
  SaveSessionOptions,
} from '#session/binding';
export type { MemorySessionStoreOptions } from '#session/store';
export type { OAuth2HandlerOptions, OAuth2RouteHandler } from '#handler';
export type { OAuth2ServerOptions } from '#server';

export { CookieSessionBinding } from '#session/binding';
export { HTTPError, registerOAuth2ErrorHandler, toHTTPError } from '#errors';
export { createLoggerConfig } from '#logging';
export { createOAuth2Handler } from '#handler';
export { createOAuth2Server } from '#server';
export { MemorySessionStore, SessionStore } from '#session/store';
export { toInterceptedRequest, toRequestParams } from '#request-context';
