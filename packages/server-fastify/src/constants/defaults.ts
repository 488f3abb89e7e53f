/** default port of http requests without an explicit port */
export const DEFAULT_HTTP_PORT = 80;

/** default port of https requests without an explicit port */
export const DEFAULT_HTTPS_PORT = 443;

/** default name of the session id cookie */
export const DEFAULT_SESSION_COOKIE = 'authgate.sid';

/** inactivity timeout of the bundled in-memory sessions (30 minutes) */
export const DEFAULT_SESSION_TIMEOUT = 30 * 60 * 1000;

/** session cap of the bundled in-memory store */
export const DEFAULT_MAX_SESSIONS = 10_000;
