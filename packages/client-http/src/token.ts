import { isRecord } from '@authgate/core';

import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON } from '#constants/http';
import { parseFormBody } from '#form';

import type {
  JsonObject,
  JsonValue,
  OAuth2Data,
  OAuthErrorWire,
  TokenResponseWire,
} from '@authgate/core';

/** fields of a token response lifted into {@link OAuth2Data} */
const TOKEN_FIELDS = new Set([
  'access_token',
  'token_type',
  'expires_in',
  'refresh_token',
]);

/**
 * checks whether a json value is an object
 * @param value parsed json value
 * @returns true if the value is a json object
 */
function isJsonObject(value: JsonValue): value is JsonObject {
  return isRecord(value);
}

/**
 * parses a json document, tolerating invalid input
 * @param text raw body
 * @returns parsed object or undefined when the body is not a json object
 */
function parseJsonObject(text: string): JsonObject | undefined {
  try {
    const value: JsonValue = JSON.parse(text);

    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * decodes an authorization server response body
 *
 * json and form-encoded bodies are both accepted. without a recognized
 * content type the body is read as json first, then as a form.
 * @param contentType content type header of the response
 * @param text raw body
 * @returns decoded fields, undefined for an empty or unreadable body
 */
export function decodeResponseBody(
  contentType: string | null,
  text: string,
): JsonObject | undefined {
  if (!text) {
    return undefined;
  }

  if (contentType?.includes(CONTENT_TYPE_FORM)) {
    return parseFormBody(text);
  }

  const json = parseJsonObject(text);
  if (json || contentType?.includes(CONTENT_TYPE_JSON)) {
    return json;
  }

  return text.includes('=') ? parseFormBody(text) : undefined;
}

/**
 * reads a numeric field that form-encoded bodies carry as a string
 * @param value raw field value
 * @returns number or undefined if the value is not numeric
 */
function toNumber(value: JsonValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return value;
  }

  return typeof value === 'string' && /^\d+$/.test(value)
    ? Number(value)
    : undefined;
}

/**
 * reads a string field
 * @param value raw field value
 * @returns string or undefined
 */
function toString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * validates a successful token endpoint response
 * @param body decoded response body
 * @returns token response in wire format, undefined without an access token
 */
export function toTokenResponse(
  body: JsonObject | undefined,
): TokenResponseWire | undefined {
  const accessToken = toString(body?.access_token);
  if (!body || !accessToken) {
    return undefined;
  }

  /* eslint-disable @typescript-eslint/naming-convention */
  const {
    access_token: _accessToken,
    token_type: rawTokenType,
    expires_in: rawExpiresIn,
    refresh_token: rawRefreshToken,
    ...fields
  } = body;
  const tokenType = toString(rawTokenType);
  const expiresIn = toNumber(rawExpiresIn);
  const refreshToken = toString(rawRefreshToken);

  return {
    ...fields,
    access_token: accessToken,
    ...(tokenType !== undefined && { token_type: tokenType }),
    ...(expiresIn !== undefined && { expires_in: expiresIn }),
    ...(refreshToken !== undefined && { refresh_token: refreshToken }),
  };
  /* eslint-enable @typescript-eslint/naming-convention */
}

/**
 * reads the OAuth error of a failed response
 * @param body decoded response body
 * @param status http status code
 * @returns OAuth error in wire format, `server_error` when the body has none
 */
export function toOAuthError(
  body: JsonObject | undefined,
  status: number,
): OAuthErrorWire {
  const error = toString(body?.error);
  if (!error) {
    return {
      error: 'server_error',
      error_description: `authorization server returned status ${status}`,
    };
  }

  const description = toString(body?.error_description);
  const uri = toString(body?.error_uri);

  /* eslint-disable @typescript-eslint/naming-convention */
  return {
    error,
    ...(description !== undefined && { error_description: description }),
    ...(uri !== undefined && { error_uri: uri }),
  };
  /* eslint-enable @typescript-eslint/naming-convention */
}

/**
 * converts a token response into the token data kept in the session
 * @param token token response in wire format
 * @returns token data, provider-specific fields under `params`
 */
export function toOAuth2Data(token: TokenResponseWire): OAuth2Data {
  const params: JsonObject = {};
  for (const [key, value] of Object.entries(token)) {
    if (!TOKEN_FIELDS.has(key) && value !== undefined) {
      params[key] = value;
    }
  }

  return {
    accessToken: token.access_token,
    ...(token.token_type !== undefined && { tokenType: token.token_type }),
    ...(token.expires_in !== undefined && { expiresIn: token.expires_in }),
    ...(token.refresh_token !== undefined && {
      refreshToken: token.refresh_token,
    }),
    ...(Object.keys(params).length > 0 && { params }),
  };
}
