export type {
  AuthorizedFetch,
  AuthorizedFetchOptions,
} from '#authorized-fetch';
export type {
  HttpAuthorizationServerClientParams,
  PasswordCredentials,
} from '#client';

export { createAuthorizedFetch } from '#authorized-fetch';
export { HttpAuthorizationServerClient } from '#client';
export { buildFormBody, createBasicAuthHeader, parseFormBody } from '#form';
export {
  decodeResponseBody,
  toOAuth2Data,
  toOAuthError,
  toTokenResponse,
} from '#token';
