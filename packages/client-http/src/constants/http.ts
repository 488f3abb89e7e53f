// HTTP CONSTANTS //

/** content type of OAuth token and error responses */
export const CONTENT_TYPE_JSON = 'application/json';
/** content type of OAuth token requests, also used by some providers for responses */
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// OAUTH PARAMETERS //

/** grant type of the authorization code exchange */
export const GRANT_AUTHORIZATION_CODE = 'authorization_code';
/** grant type of the resource owner password flow */
export const GRANT_PASSWORD = 'password';
/** grant type of the refresh flow */
export const GRANT_REFRESH_TOKEN = 'refresh_token';

/** query parameter carrying the access token to the token info endpoint */
export const ACCESS_TOKEN_PARAM = 'access_token';
