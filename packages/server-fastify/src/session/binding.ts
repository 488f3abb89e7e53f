import { randomUUID } from 'node:crypto';

import { DEFAULT_SESSION_COOKIE } from '#constants/defaults';

import type { Session } from '@authgate/core';
import type { CookieSerializeOptions } from '@fastify/cookie';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type { SessionStore } from './store';

/** options of {@link CookieSessionBinding} */
export interface CookieSessionBindingOptions {
  /** backend holding the session data */
  store: SessionStore;
  /** name of the session id cookie (default: `authgate.sid`) */
  cookieName?: string;
  /** attributes of the session id cookie (default: `secure` on https requests) */
  cookie?: CookieSerializeOptions;
  /** session id source (default: random uuid) */
  generateId?: () => string;
}

/** session of the current request */
export interface LoadedSession {
  /** session id read from the cookie, if the session exists */
  id?: string;
  /** session data, empty for a new visitor */
  session: Session;
}

/** options of {@link CookieSessionBinding.save} */
export interface SaveSessionOptions {
  /** issue a new session id and drop the old one, e.g. on sign-in */
  regenerate?: boolean;
}

/**
 * binds sessions to requests through a session id cookie
 *
 * only the id travels in the cookie, the data stays in the store.
 * @example
 * ```typescript
 * const sessions = new CookieSessionBinding({
 *   store: new MemorySessionStore({ sessionTimeout: 3_600_000 }),
 *   cookie: { secure: true },
 * });
 * ```
 */
export class CookieSessionBinding {
  readonly #store: SessionStore;
  readonly #cookieName: string;
  readonly #cookie: CookieSerializeOptions;
  readonly #generateId: () => string;

  /**
   * creates a new binding
   * @param options store and cookie settings
   */
  constructor(options: CookieSessionBindingOptions) {
    this.#store = options.store;
    this.#cookieName = options.cookieName ?? DEFAULT_SESSION_COOKIE;
    this.#cookie = {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      ...options.cookie,
    };
    this.#generateId = options.generateId ?? randomUUID;
  }

  /**
   * loads the session of a request
   * @param request incoming request
   * @returns session id and data, empty data when the cookie is unknown
   */
  public async load(request: FastifyRequest): Promise<LoadedSession> {
    const id = request.cookies[this.#cookieName];
    if (!id) {
      return { session: {} };
    }

    const session = await this.#store.get(id);

    return session ? { id, session } : { session: {} };
  }

  /**
   * persists the session to write back, replacing the stored one
   * @param reply reply receiving the session cookie
   * @param loaded session loaded for the request
   * @param session session to persist
   * @param options save options
   */
  public async save(
    reply: FastifyReply,
    loaded: LoadedSession,
    session: Session,
    options: SaveSessionOptions = {},
  ): Promise<void> {
    const id =
      options.regenerate || loaded.id === undefined
        ? this.#generateId()
        : loaded.id;

    if (loaded.id !== undefined && loaded.id !== id) {
      await this.#store.drop(loaded.id);
    }

    await this.#store.set(id, session);

    if (id !== loaded.id) {
      reply.setCookie(this.#cookieName, id, {
        secure: reply.request.protocol === 'https',
        ...this.#cookie,
      });
    }
  }
}
