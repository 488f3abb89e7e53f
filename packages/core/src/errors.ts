import type { JsonifibleObject, JsonObject } from '#json';

/**
 * thrown at setup when the interceptor configuration is malformed
 * e.g. an unsupported exclusion shape or a missing endpoint
 */
export class ConfigurationError extends Error {
  /**
   * creates a new configuration error
   * @param message error message describing the misconfiguration
   * @param cause underlying parse error, if any
   */
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigurationError';
  }
}

/**
 * thrown when the state returned on the authorization callback differs from
 * the one stored before the redirect
 *
 * never recoverable within the pipeline: the callback must be aborted.
 */
export class StateMismatchError extends Error {
  /**
   * creates a new state mismatch error
   * @param message error message describing the mismatch
   */
  constructor(message = 'OAuth2 state does not match the stored state') {
    super(message);
    this.name = 'StateMismatchError';
  }
}

/**
 * thrown when the authorization server answers with an OAuth error
 * (`error` / `error_description`) instead of a code or a token
 */
export class ProtocolError extends Error {
  /** OAuth error code sent by the authorization server */
  public readonly error: string;
  /** human readable description sent by the authorization server */
  public readonly errorDescription?: string;
  /** documentation link sent by the authorization server */
  public readonly errorUri?: string;

  /**
   * creates a new protocol error
   * @param error OAuth error code
   * @param errorDescription optional error description
   * @param errorUri optional error documentation uri
   */
  constructor(error: string, errorDescription?: string, errorUri?: string) {
    super(
      errorDescription
        ? `OAuth2 error ${error}: ${errorDescription}`
        : `OAuth2 error ${error}`,
    );
    this.name = 'ProtocolError';
    this.error = error;
    this.errorDescription = errorDescription;
    this.errorUri = errorUri;
  }
}

/**
 * thrown when a call to the authorization server could not complete
 * (connection refused, dns failure, unreadable body)
 */
export class NetworkError extends Error {
  /**
   * creates a new network error
   * @param message error message describing the failed call
   * @param cause underlying error raised by the transport
   */
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}

/**
 * describes a refresh attempt rejected by the authorization server
 *
 * handled inside the pipeline (re-authorization or a 400 response) and only
 * surfaced to the log.
 */
export class RefreshFailure extends Error {
  /** OAuth error code sent by the authorization server */
  public readonly error: string;
  /** human readable description sent by the authorization server */
  public readonly errorDescription?: string;

  /**
   * creates a new refresh failure
   * @param error OAuth error code
   * @param errorDescription optional error description
   */
  constructor(error: string, errorDescription?: string) {
    super(
      errorDescription
        ? `Refresh token failed (${error}): ${errorDescription}`
        : `Refresh token failed (${error})`,
    );
    this.name = 'RefreshFailure';
    this.error = error;
    this.errorDescription = errorDescription;
  }
}

/**
 * converts any error caught in a try-catch block to a json-compatible format
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  const type = typeof error;

  switch (typeof error) {
    case 'object':
      if (error instanceof Error) {
        return {
          type: 'Error',
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error instanceof ProtocolError && {
            error: error.error,
            errorDescription: error.errorDescription,
          }),
          ...(error.cause !== undefined && {
            cause: jsonifyError(error.cause),
          }),
        };
      } else if (error === null) {
        return { type: 'null', value: error };
      } else {
        const serialized = JSON.parse(
          JSON.stringify(error, getCircularReplacer()),
        ) as JsonObject;

        return {
          type: Array.isArray(error) ? 'array' : 'object',
          value: serialized,
        };
      }
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type, value: error };
    case 'function':
      return { type, name: error.name || 'anonymous' };
    case 'bigint':
      return { type, value: String(error) };
    case 'symbol':
      return { type, description: error.description };
    default:
      return { type: 'unknown' };
  }
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet();

  return (_key: string, value: unknown) => {
    if (typeof value === 'function') {
      return undefined;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
