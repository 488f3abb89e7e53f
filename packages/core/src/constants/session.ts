/** session slot holding the CSRF state sent to the authorization server */
export const STATE_SLOT = 'state';

/** session slot holding the uri to return to after the callback */
export const TARGET_SLOT = 'target';

/** session slot holding the token data */
export const OAUTH2_SLOT = 'oauth2';

/**
 * default length of a generated CSRF state
 * @description 20 characters over a 62 symbol alphabet, roughly 119 bits.
 */
export const DEFAULT_STATE_LENGTH = 20;

/** location used when no target was stored before the redirect */
export const DEFAULT_TARGET = '/';
