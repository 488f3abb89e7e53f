/**
 * HTTP 400 Bad Request status code
 * @description the authorization server sent an OAuth error or the callback was malformed.
 */
export const HTTP_BAD_REQUEST = 400;
/**
 * HTTP 403 Forbidden status code
 * @description the callback state does not match the state stored before the redirect.
 */
export const HTTP_FORBIDDEN = 403;
/**
 * HTTP 500 Internal Server Error status code
 * @description the interceptor is misconfigured or an unexpected error occurred.
 */
export const HTTP_INTERNAL_SERVER_ERROR = 500;
/**
 * HTTP 502 Bad Gateway status code
 * @description the authorization server could not be reached.
 * @example
 * ```typescript
 * if (error instanceof NetworkError) {
 *   reply.code(HTTP_BAD_GATEWAY).send({ error: 'temporarily_unavailable' });
 * }
 * ```
 */
export const HTTP_BAD_GATEWAY = 502;
