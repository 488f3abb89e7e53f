import type { OAuth2Params } from '#config';
import type {
  AuthRequest,
  CallbackParams,
  OAuth2Data,
  RefreshResult,
} from '#types';

/**
 * client configuration needed to talk to the authorization server
 */
export type ClientParams = Pick<
  OAuth2Params,
  | 'clientId'
  | 'clientSecret'
  | 'scope'
  | 'authorizationUri'
  | 'accessTokenUri'
  | 'redirectUri'
  | 'userinfoUri'
  | 'authorizationHeader'
>;

/**
 * network-facing collaborator performing the calls to the authorization server
 *
 * every method must reject with a `NetworkError` when the server cannot be
 * reached, so that a transport failure is never mistaken for an invalid token.
 */
export interface AuthorizationServerClient {
  /**
   * builds the authorization request the user is redirected to
   * @param params client configuration
   * @param state CSRF state carried through the redirect
   * @returns authorization request with the full authorize uri
   */
  buildAuthRequest(params: ClientParams, state: string): AuthRequest;

  /**
   * exchanges the authorization code received on the callback for a token
   * @param params client configuration
   * @param callbackParams parameters received on the callback
   * @param authRequest authorization request rebuilt from the stored state
   * @returns token data
   * @throws {import('#errors').ProtocolError} when the server answers with an OAuth error
   * @throws {import('#errors').StateMismatchError} when the callback state differs
   */
  exchangeCodeForToken(
    params: ClientParams,
    callbackParams: CallbackParams,
    authRequest: AuthRequest,
  ): Promise<OAuth2Data>;

  /**
   * obtains a new access token with a refresh token
   * @param refreshToken refresh token stored with the token data
   * @param params client configuration
   * @returns the token response on success, the OAuth error otherwise
   */
  refreshAccessToken(
    refreshToken: string,
    params: ClientParams,
  ): Promise<RefreshResult>;

  /**
   * checks whether an access token is still valid
   * @param tokenInfoUri token information endpoint
   * @param accessToken access token to check
   * @returns true if the server accepts the token
   */
  introspectToken(tokenInfoUri: string, accessToken: string): Promise<boolean>;

  /**
   * adds user information to freshly obtained token data
   * @param data token data
   * @param params client configuration
   * @returns token data merged with the user information
   */
  fetchUserinfo(data: OAuth2Data, params: ClientParams): Promise<OAuth2Data>;
}
