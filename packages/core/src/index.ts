export type { AuthorizationServerClient, ClientParams } from '#client';
export type {
  LogoutCallback,
  OAuth2Options,
  OAuth2Params,
  OAuth2Settings,
} from '#config';
export type { InterceptorContext, InterceptorOptions } from '#context';
export type {
  ExclusionInput,
  ExclusionPredicate,
  ExclusionSpec,
} from '#exclusion';
export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type { Log, LogLevel } from '#logging';
export type { SessionAccessors } from '#session-accessors';
export type { Stage, StageName } from '#stages/stage';
export type { StateGenerator } from '#state';
export type {
  AuthRequest,
  CallbackParams,
  Handler,
  InterceptedRequest,
  InterceptedResponse,
  OAuth2Data,
  OAuthErrorWire,
  RefreshResult,
  RequestHeaders,
  RequestParams,
  Session,
  TokenResponseWire,
} from '#types';

export {
  HTTP_BAD_REQUEST,
  HTTP_FOUND,
  HTTP_OK,
  JSON_CONTENT_TYPE,
} from '#constants/http';
export {
  DEFAULT_STATE_LENGTH,
  OAUTH2_SLOT,
  STATE_SLOT,
  TARGET_SLOT,
} from '#constants/session';
export {
  ENV_VARIABLES,
  createOAuth2Params,
  createOAuth2ParamsFromEnv,
  oauth2LogoutCallbackHandler,
  readOAuth2SettingsFromEnv,
} from '#config';
export {
  ConfigurationError,
  NetworkError,
  ProtocolError,
  RefreshFailure,
  StateMismatchError,
  jsonifyError,
} from '#errors';
export { isExcluded, toExclusionSpec } from '#exclusion';
export { isRecord } from '#json';
export {
  composeStages,
  createContext,
  createStages,
  wrapOAuth2,
  wrapRedirectUnauthenticated,
} from '#pipeline';
export { acceptsHtml, firstParam, lastHeader, pathOf, requestTarget } from '#request';
export {
  clearOAuth2DataInSession,
  getOAuth2DataFromSession,
  getStateFromSession,
  getTargetFromSession,
  isOAuth2Data,
  putOAuth2DataInSession,
  putStateInSession,
  putTargetInSession,
  sessionAccessors,
} from '#session-accessors';
export { readCallbackParams } from '#stages/callback';
export { redirectToAuthorizationServer } from '#stages/redirect';
export {
  REFRESH_FAILED_BODY,
  mergeRefreshedToken,
  refreshFailedResponse,
} from '#stages/validate';
export { generateState, randomAlphanumeric } from '#state';
