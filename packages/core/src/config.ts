import { Ajv } from 'ajv';

import { ConfigurationError } from '#errors';
import { toExclusionSpec } from '#exclusion';
import { pathOf } from '#request';
import { sessionAccessors } from '#session-accessors';

import type { ExclusionInput, ExclusionSpec } from '#exclusion';
import type { SessionAccessors } from '#session-accessors';
import type { InterceptedRequest, InterceptedResponse } from '#types';

/** handler invoked when the authorization server redirects back after logout */
export type LogoutCallback = (
  request: InterceptedRequest,
  params: OAuth2Params,
) => InterceptedResponse | Promise<InterceptedResponse>;

/**
 * serializable part of the interceptor configuration
 */
export interface OAuth2Settings {
  /** client identifier registered with the authorization server */
  clientId: string;
  /** client secret registered with the authorization server */
  clientSecret?: string;
  /** requested scopes, as a list or a space separated string */
  scope?: readonly string[] | string;
  /** authorization endpoint the user is redirected to */
  authorizationUri: string;
  /** token endpoint used for code exchange and refresh */
  accessTokenUri: string;
  /** callback uri registered with the authorization server */
  redirectUri: string;
  /** endpoint confirming that an access token is still valid */
  tokenInfoUri?: string;
  /** endpoint returning user information for an access token */
  userinfoUri?: string;
  /** send client credentials with http basic instead of the form body */
  authorizationHeader?: boolean;
  /** authorization server logout endpoint */
  logoutUri?: string;
  /** local path triggering a logout */
  logoutUriClient?: string;
  /** local path the authorization server redirects to after logout */
  logoutCallbackUri?: string;
}

/**
 * interceptor configuration as supplied by the host
 * @example
 * ```typescript
 * const params = createOAuth2Params({
 *   clientId: 'my-app',
 *   clientSecret: 'test-secret',
 *   scope: ['openid', 'profile'],
 *   authorizationUri: 'https://auth.example.com/authorize',
 *   accessTokenUri: 'https://auth.example.com/token',
 *   redirectUri: 'https://app.example.com/oauth/callback',
 *   tokenInfoUri: 'https://auth.example.com/tokeninfo',
 *   exclude: ['/health', '/metrics'],
 * });
 * ```
 */
export interface OAuth2Options
  extends OAuth2Settings,
    Partial<SessionAccessors> {
  /** uris bypassing all OAuth2 processing */
  exclude?: ExclusionInput;
  /** handler for the logout callback (default: clear token data, go to `/`) */
  logoutCallbackFn?: LogoutCallback;
}

/**
 * normalized, immutable interceptor configuration
 */
export interface OAuth2Params extends SessionAccessors {
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly scope: readonly string[];
  readonly authorizationUri: string;
  readonly accessTokenUri: string;
  readonly redirectUri: string;
  readonly tokenInfoUri?: string;
  readonly userinfoUri?: string;
  readonly authorizationHeader: boolean;
  readonly exclude?: ExclusionSpec;
  readonly logoutUri?: string;
  readonly logoutUriClient?: string;
  readonly logoutCallbackUri?: string;
  readonly logoutCallbackFn: LogoutCallback;
}

/** environment variables read by {@link readOAuth2SettingsFromEnv} */
export const ENV_VARIABLES = {
  clientId: 'AUTHGATE_CLIENT_ID',
  clientSecret: 'AUTHGATE_CLIENT_SECRET',
  scope: 'AUTHGATE_SCOPE',
  authorizationUri: 'AUTHGATE_AUTHORIZATION_URI',
  accessTokenUri: 'AUTHGATE_ACCESS_TOKEN_URI',
  redirectUri: 'AUTHGATE_REDIRECT_URI',
  tokenInfoUri: 'AUTHGATE_TOKEN_INFO_URI',
  userinfoUri: 'AUTHGATE_USERINFO_URI',
  logoutUri: 'AUTHGATE_LOGOUT_URI',
  logoutUriClient: 'AUTHGATE_LOGOUT_URI_CLIENT',
  logoutCallbackUri: 'AUTHGATE_LOGOUT_CALLBACK_URI',
} as const satisfies Partial<Record<keyof OAuth2Settings, string>>;

const nonEmptyString = { type: 'string', minLength: 1 } as const;

const settingsSchema = {
  type: 'object',
  required: ['clientId', 'authorizationUri', 'accessTokenUri', 'redirectUri'],
  properties: {
    clientId: nonEmptyString,
    clientSecret: { type: 'string' },
    scope: {
      anyOf: [
        { type: 'string' },
        { type: 'array', items: { type: 'string' } },
      ],
    },
    authorizationUri: nonEmptyString,
    accessTokenUri: nonEmptyString,
    redirectUri: nonEmptyString,
    tokenInfoUri: nonEmptyString,
    userinfoUri: nonEmptyString,
    authorizationHeader: { type: 'boolean' },
    logoutUri: nonEmptyString,
    logoutUriClient: nonEmptyString,
    logoutCallbackUri: nonEmptyString,
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateSettings = ajv.compile<OAuth2Settings>(settingsSchema);

/**
 * removes token data from the session and redirects to the root
 * @param request logout callback request
 * @param params interceptor configuration providing the session accessors
 * @returns redirect to `/` without the `oauth2` session slot
 */
export const oauth2LogoutCallbackHandler: LogoutCallback = (request, params) =>
  params.clearOAuth2Data(request, {
    status: 302,
    headers: { Location: '/' },
    body: '',
  });

/**
 * normalizes the scope option
 * @param scope list of scopes or space separated string
 * @returns ordered list of scopes
 */
function normalizeScope(scope: OAuth2Settings['scope']): readonly string[] {
  if (scope === undefined) {
    return [];
  }

  return typeof scope === 'string'
    ? scope.split(/\s+/).filter((entry) => entry.length > 0)
    : [...scope];
}

/** endpoints the client calls, which must be absolute urls */
const ENDPOINTS = [
  'authorizationUri',
  'accessTokenUri',
  'tokenInfoUri',
  'userinfoUri',
] as const satisfies ReadonlyArray<keyof OAuth2Settings>;

/**
 * ensures an endpoint is an absolute url
 * @param name option name, used in the error message
 * @param uri configured endpoint
 * @throws {ConfigurationError} when the uri is not absolute
 */
function requireAbsoluteUrl(name: string, uri: string): void {
  try {
    new URL(uri);
  } catch (error) {
    throw new ConfigurationError(
      `OAuth2 config: ${name} must be an absolute url, got ${uri}`,
      error,
    );
  }
}

/**
 * reads the path of a configured route
 * @param name option name, used in the error message
 * @param uri configured absolute or relative uri
 * @returns path component
 * @throws {ConfigurationError} when the uri cannot be parsed
 */
function routePathOf(name: string, uri: string): string {
  try {
    return pathOf(uri);
  } catch (error) {
    throw new ConfigurationError(
      `OAuth2 config: ${name} is not a valid uri, got ${uri}`,
      error,
    );
  }
}

/**
 * ensures the endpoints are absolute, the local logout routes are complete
 * and the callback path cannot be mistaken for a logout path
 * @param options interceptor options
 * @throws {ConfigurationError} when an endpoint or a route is invalid
 */
function validateRoutes(options: OAuth2Settings): void {
  for (const name of ENDPOINTS) {
    const uri = options[name];
    if (uri !== undefined) {
      requireAbsoluteUrl(name, uri);
    }
  }

  if (options.logoutUriClient !== undefined && !options.logoutUri) {
    throw new ConfigurationError(
      'OAuth2 config: logoutUri is required when logoutUriClient is set',
    );
  }

  const callbackPath = routePathOf('redirectUri', options.redirectUri);

  for (const [name, uri] of [
    ['logoutUriClient', options.logoutUriClient],
    ['logoutCallbackUri', options.logoutCallbackUri],
  ] as const) {
    if (uri !== undefined && routePathOf(name, uri) === callbackPath) {
      throw new ConfigurationError(
        `OAuth2 config: redirectUri path ${callbackPath} must differ from ${name}`,
      );
    }
  }
}

/**
 * validates the configuration and fills in the defaults
 * @param options interceptor options
 * @returns normalized interceptor configuration
 * @throws {ConfigurationError} when the configuration is invalid
 */
export function createOAuth2Params(options: OAuth2Options): OAuth2Params {
  if (!validateSettings(options)) {
    throw new ConfigurationError(
      `OAuth2 config: ${ajv.errorsText(validateSettings.errors, { dataVar: 'options' })}`,
    );
  }

  validateRoutes(options);

  return Object.freeze({
    getState: options.getState ?? sessionAccessors.getState,
    putState: options.putState ?? sessionAccessors.putState,
    getTarget: options.getTarget ?? sessionAccessors.getTarget,
    putTarget: options.putTarget ?? sessionAccessors.putTarget,
    getOAuth2Data: options.getOAuth2Data ?? sessionAccessors.getOAuth2Data,
    putOAuth2Data: options.putOAuth2Data ?? sessionAccessors.putOAuth2Data,
    clearOAuth2Data:
      options.clearOAuth2Data ?? sessionAccessors.clearOAuth2Data,
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    scope: normalizeScope(options.scope),
    authorizationUri: options.authorizationUri,
    accessTokenUri: options.accessTokenUri,
    redirectUri: options.redirectUri,
    tokenInfoUri: options.tokenInfoUri,
    userinfoUri: options.userinfoUri,
    authorizationHeader: options.authorizationHeader ?? false,
    exclude:
      options.exclude === undefined
        ? undefined
        : toExclusionSpec(options.exclude),
    logoutUri: options.logoutUri,
    logoutUriClient: options.logoutUriClient,
    logoutCallbackUri: options.logoutCallbackUri,
    logoutCallbackFn: options.logoutCallbackFn ?? oauth2LogoutCallbackHandler,
  });
}

/**
 * reads the serializable settings from the environment
 * @param env environment variables (default: `process.env`)
 * @returns settings found in the environment, unset variables left undefined
 */
export function readOAuth2SettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<OAuth2Settings> {
  const read = (variable: string): string | undefined =>
    env[variable] === '' ? undefined : env[variable];

  return {
    clientId: read(ENV_VARIABLES.clientId),
    clientSecret: read(ENV_VARIABLES.clientSecret),
    scope: read(ENV_VARIABLES.scope),
    authorizationUri: read(ENV_VARIABLES.authorizationUri),
    accessTokenUri: read(ENV_VARIABLES.accessTokenUri),
    redirectUri: read(ENV_VARIABLES.redirectUri),
    tokenInfoUri: read(ENV_VARIABLES.tokenInfoUri),
    userinfoUri: read(ENV_VARIABLES.userinfoUri),
    logoutUri: read(ENV_VARIABLES.logoutUri),
    logoutUriClient: read(ENV_VARIABLES.logoutUriClient),
    logoutCallbackUri: read(ENV_VARIABLES.logoutCallbackUri),
  };
}

/**
 * builds the configuration from the environment, with explicit overrides
 * @param overrides options taking precedence over the environment
 * @param env environment variables (default: `process.env`)
 * @returns normalized interceptor configuration
 * @throws {ConfigurationError} when a required setting is missing
 */
export function createOAuth2ParamsFromEnv(
  overrides: Partial<OAuth2Options> = {},
  env: NodeJS.ProcessEnv = process.env,
): OAuth2Params {
  const options = { ...readOAuth2SettingsFromEnv(env), ...overrides };

  if (!validateSettings(options)) {
    throw new ConfigurationError(
      `OAuth2 config: ${ajv.errorsText(validateSettings.errors, { dataVar: 'options' })}`,
    );
  }

  return createOAuth2Params(options);
}
