/**
 * HTTP 200 OK status code
 * @description standard response for successful HTTP requests.
 */
export const HTTP_OK = 200;
/**
 * HTTP 302 Found status code
 * @description indicates that the resource requested has been temporarily moved to another URI.
 */
export const HTTP_FOUND = 302;
/**
 * HTTP 400 Bad Request status code
 * @description the server cannot or will not process the request due to client error.
 */
export const HTTP_BAD_REQUEST = 400;

/** content type of the structured refresh failure response */
export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
