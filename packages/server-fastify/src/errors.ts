import {
  ConfigurationError,
  NetworkError,
  ProtocolError,
  StateMismatchError,
  jsonifyError,
} from '@authgate/core';

import {
  HTTP_BAD_GATEWAY,
  HTTP_BAD_REQUEST,
  HTTP_FORBIDDEN,
  HTTP_INTERNAL_SERVER_ERROR,
} from '#constants/http';

import type { JsonObject } from '@authgate/core';
import type { FastifyInstance } from 'fastify';

/**
 * HTTP error with customizable status code, headers, and response body
 */
export class HTTPError extends Error {
  public readonly code: number;
  public readonly headers: Record<string, string>;
  public readonly body: string;

  /**
   * creates an http error with the specified code, headers, and body
   * @param params error parameters
   * @param params.code http status code
   * @param params.headers optional http headers
   * @param params.body optional response body as json object
   */
  constructor(params: {
    code: number;
    headers?: Record<string, string>;
    body?: JsonObject;
  }) {
    super();

    const { code, headers, body } = params;

    this.name = 'HTTPError';
    this.code = code;
    this.headers = {
      'content-type': body ? 'application/json' : 'text/plain',
      ...headers,
    };
    this.body = body ? JSON.stringify(body, null, 2) : '';
  }
}

/**
 * builds an OAuth error body
 * @param error OAuth error code
 * @param description optional human readable description
 * @returns json body with `error` and `error_description`
 */
function oauthErrorBody(error: string, description?: string): JsonObject {
  /* eslint-disable @typescript-eslint/naming-convention */
  return description === undefined
    ? { error }
    : { error, error_description: description };
  /* eslint-enable @typescript-eslint/naming-convention */
}

/**
 * maps an interceptor error to the http response it stands for
 * @param error error thrown by the interceptor
 * @returns http error, or undefined when the error is not an interceptor error
 */
export function toHTTPError(error: unknown): HTTPError | undefined {
  if (error instanceof HTTPError) {
    return error;
  }

  if (error instanceof StateMismatchError) {
    return new HTTPError({
      code: HTTP_FORBIDDEN,
      body: oauthErrorBody('state_mismatch', error.message),
    });
  }

  if (error instanceof ProtocolError) {
    return new HTTPError({
      code: HTTP_BAD_REQUEST,
      body: oauthErrorBody(error.error, error.errorDescription),
    });
  }

  if (error instanceof NetworkError) {
    return new HTTPError({
      code: HTTP_BAD_GATEWAY,
      body: oauthErrorBody(
        'temporarily_unavailable',
        'authorization server unreachable',
      ),
    });
  }

  if (error instanceof ConfigurationError) {
    return new HTTPError({
      code: HTTP_INTERNAL_SERVER_ERROR,
      body: oauthErrorBody('server_error', error.message),
    });
  }

  return undefined;
}

/**
 * reads the status code fastify attaches to its own errors
 * @param error error caught by fastify
 * @returns status code, 500 when the error carries none
 */
function statusCodeOf(error: unknown): number {
  return error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
    ? error.statusCode
    : HTTP_INTERNAL_SERVER_ERROR;
}

/**
 * installs the error handler turning interceptor errors into http responses
 * @param server fastify instance to configure
 */
export function registerOAuth2ErrorHandler(server: FastifyInstance): void {
  server.setErrorHandler(async (error, request, reply) => {
    const httpError = toHTTPError(error);

    if (httpError) {
      request.log.warn({ error: jsonifyError(error) }, 'OAuth2 request failed');

      return reply
        .code(httpError.code)
        .headers(httpError.headers)
        .send(httpError.body);
    }

    request.log.error({
      error: jsonifyError(error),
      url: request.url,
      method: request.method,
    });

    return reply.code(statusCodeOf(error)).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred. Check server logs for details.',
    });
  });
}
