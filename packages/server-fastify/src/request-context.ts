import { isRecord } from '@authgate/core';

import { DEFAULT_HTTPS_PORT, DEFAULT_HTTP_PORT } from '#constants/defaults';

import type {
  InterceptedRequest,
  RequestParams,
  Session,
} from '@authgate/core';
import type { FastifyRequest } from 'fastify';

/**
 * keeps the string values of parsed query or form parameters
 * @param source parsed parameters of unknown shape
 * @returns parameters holding strings or lists of strings
 */
export function toRequestParams(source: unknown): RequestParams {
  const params: RequestParams = {};
  if (!isRecord(source)) {
    return params;
  }

  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (Array.isArray(value)) {
      params[key] = value.filter(
        (entry): entry is string => typeof entry === 'string',
      );
    }
  }

  return params;
}

/**
 * translates a fastify request into the interceptor's request view
 * @param request fastify request
 * @param session session loaded for the request
 * @returns framework-neutral request, form fields taking precedence over the query
 */
export function toInterceptedRequest(
  request: FastifyRequest,
  session: Session,
): InterceptedRequest {
  const scheme = request.protocol === 'https' ? 'https' : 'http';
  const [uri, queryString] = splitUrl(request.url);

  return {
    scheme,
    host: request.hostname,
    port:
      request.port ??
      (scheme === 'https' ? DEFAULT_HTTPS_PORT : DEFAULT_HTTP_PORT),
    uri,
    queryString,
    headers: request.headers,
    params: {
      ...toRequestParams(request.query),
      ...toRequestParams(request.body),
    },
    session,
  };
}

/**
 * splits a request url into path and query string
 * @param url raw request url
 * @returns path and query string without the leading `?`
 */
function splitUrl(url: string): [string, string | undefined] {
  const index = url.indexOf('?');
  if (index === -1) {
    return [url, undefined];
  }

  const queryString = url.slice(index + 1);

  return [url.slice(0, index), queryString || undefined];
}
