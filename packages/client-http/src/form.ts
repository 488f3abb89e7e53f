/**
 * creates basic authorization header from client credentials.
 * @param clientId client identifier
 * @param clientSecret client secret
 * @returns basic authorization header value
 */
export function createBasicAuthHeader(
  clientId: string,
  clientSecret: string,
): string {
  const credentials = `${clientId}:${clientSecret}`;
  const encoded = Buffer.from(credentials).toString('base64');

  return `Basic ${encoded}`;
}

/**
 * builds a form-encoded request body.
 * @param params key-value pairs to encode, undefined values are skipped
 * @returns URLSearchParams-encoded string
 */
export function buildFormBody(
  params: Record<string, string | undefined>,
): string {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.set(key, value);
    }
  }

  return searchParams.toString();
}

/**
 * decodes a form-encoded body, keeping the last value of repeated keys
 * @param body form-encoded string
 * @returns decoded fields
 */
export function parseFormBody(body: string): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body));
}
