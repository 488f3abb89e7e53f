import type { OAuth2Data } from '@authgate/core';

/** fetch bound to an access token */
export type AuthorizedFetch = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

/** options of {@link createAuthorizedFetch} */
export interface AuthorizedFetchOptions {
  /** custom fetch implementation for HTTP requests (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /**
   * send the token as this query parameter instead of a bearer header,
   * for resource servers that only read it from the url
   */
  queryParam?: string;
}

/**
 * wraps fetch so that every request carries the access token
 * @param data token data of the current user
 * @param options fetch implementation and token placement
 * @returns fetch sending the token as a bearer header or a query parameter
 * @example
 * ```typescript
 * const fetchAsUser = createAuthorizedFetch(request.oauth2);
 * const response = await fetchAsUser('https://api.example.com/me');
 * ```
 */
export function createAuthorizedFetch(
  data: OAuth2Data,
  options: AuthorizedFetchOptions = {},
): AuthorizedFetch {
  const fetchImpl = options.fetch ?? fetch;
  const { queryParam } = options;

  return async (input, init = {}) => {
    if (queryParam) {
      const url = new URL(input);
      url.searchParams.set(queryParam, data.accessToken);

      return fetchImpl(url, init);
    }

    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${data.accessToken}`);

    return fetchImpl(input, { ...init, headers });
  };
}
