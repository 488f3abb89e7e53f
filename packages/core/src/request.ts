import type { InterceptedRequest, RequestHeaders, RequestParams } from '#types';

/** base used to read the path of relative uris */
const PLACEHOLDER_ORIGIN = 'http://localhost';

/**
 * extracts the last value from request headers when multiple values exist
 * @param headers request headers
 * @param header header name to extract
 * @returns last header value or undefined if not found
 */
export function lastHeader(
  headers: RequestHeaders,
  header: string,
): string | undefined {
  const targetHeader = header.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === targetHeader) {
      if (Array.isArray(value)) {
        return value[value.length - 1];
      }

      return value;
    }
  }

  return undefined;
}

/**
 * reads the first value of a request parameter
 * @param params parsed request parameters
 * @param name parameter name
 * @returns first value or undefined if absent
 */
export function firstParam(
  params: RequestParams,
  name: string,
): string | undefined {
  const value = params[name];

  return Array.isArray(value) ? value[0] : value;
}

/**
 * extracts the path component of a configured absolute or relative uri
 *
 * only for configured uris, checked at setup; request uris are compared as
 * they arrive.
 * @param uri uri such as `https://app.example.com/cb?x=1` or `/cb`
 * @returns path component, e.g. `/cb`
 * @throws {TypeError} when the uri cannot be parsed
 */
export function pathOf(uri: string): string {
  return new URL(uri, PLACEHOLDER_ORIGIN).pathname;
}

/**
 * builds the uri the user was trying to reach
 * @param request current request
 * @returns path plus query string when one is present
 */
export function requestTarget(request: InterceptedRequest): string {
  return request.queryString
    ? `${request.uri}?${request.queryString}`
    : request.uri;
}

/**
 * tells whether the client is a browser expecting html
 * @param request current request
 * @returns true if the accept header lists `text/html`
 */
export function acceptsHtml(request: InterceptedRequest): boolean {
  return lastHeader(request.headers, 'accept')?.includes('text/html') ?? false;
}
