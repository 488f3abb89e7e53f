import { OAUTH2_SLOT, STATE_SLOT, TARGET_SLOT } from '#constants/session';
import { isRecord } from '#json';

import type {
  InterceptedRequest,
  InterceptedResponse,
  OAuth2Data,
  Session,
} from '#types';

/**
 * reads and writes the interceptor's data against the host session
 *
 * every accessor is pure: writes return a new response carrying the session
 * the host has to persist. swapping the accessors moves the data to another
 * backend (e.g. a server-side cache keyed by a session slot) without
 * touching the pipeline.
 */
export interface SessionAccessors {
  /** reads the CSRF state stored before the redirect */
  getState(request: InterceptedRequest): string | undefined;
  /** stores the CSRF state in the response's session */
  putState(response: InterceptedResponse, state: string): InterceptedResponse;
  /** reads the uri to return to after the callback */
  getTarget(request: InterceptedRequest): string | undefined;
  /** stores the uri to return to in the response's session */
  putTarget(response: InterceptedResponse, target: string): InterceptedResponse;
  /** reads the token data of the current request */
  getOAuth2Data(request: InterceptedRequest): OAuth2Data | undefined;
  /** stores token data in the response's session */
  putOAuth2Data(
    request: InterceptedRequest,
    response: InterceptedResponse,
    data: OAuth2Data,
  ): InterceptedResponse;
  /** removes token data, keeping every other session slot */
  clearOAuth2Data(
    request: InterceptedRequest,
    response: InterceptedResponse,
  ): InterceptedResponse;
}

/**
 * checks whether a session value holds usable token data
 * @param value value read from the session
 * @returns true if the value has a string access token
 */
export function isOAuth2Data(value: unknown): value is OAuth2Data {
  return isRecord(value) && typeof value.accessToken === 'string';
}

/**
 * picks the session a write should start from
 * @param request current request
 * @param response response being built
 * @returns the response's session if it already declares one, else the request's
 */
function baseSession(
  request: InterceptedRequest,
  response: InterceptedResponse,
): Session {
  return response.session ?? request.session;
}

/**
 * reads a string slot from the request session
 * @param request current request
 * @param slot session slot name
 * @returns slot value if it is a string
 */
function readString(
  request: InterceptedRequest,
  slot: string,
): string | undefined {
  const value = request.session[slot];

  return typeof value === 'string' ? value : undefined;
}

export const getStateFromSession: SessionAccessors['getState'] = (request) =>
  readString(request, STATE_SLOT);

export const putStateInSession: SessionAccessors['putState'] = (
  response,
  state,
) => ({ ...response, session: { ...response.session, [STATE_SLOT]: state } });

export const getTargetFromSession: SessionAccessors['getTarget'] = (request) =>
  readString(request, TARGET_SLOT);

export const putTargetInSession: SessionAccessors['putTarget'] = (
  response,
  target,
) => ({ ...response, session: { ...response.session, [TARGET_SLOT]: target } });

export const getOAuth2DataFromSession: SessionAccessors['getOAuth2Data'] = (
  request,
) => {
  const value = request.session[OAUTH2_SLOT];

  return isOAuth2Data(value) ? value : undefined;
};

export const putOAuth2DataInSession: SessionAccessors['putOAuth2Data'] = (
  request,
  response,
  data,
) => ({
  ...response,
  session: { ...baseSession(request, response), [OAUTH2_SLOT]: data },
});

export const clearOAuth2DataInSession: SessionAccessors['clearOAuth2Data'] = (
  request,
  response,
) => {
  const { [OAUTH2_SLOT]: _cleared, ...session } = baseSession(
    request,
    response,
  );

  return { ...response, session };
};

/** accessors storing everything in the host session */
export const sessionAccessors: SessionAccessors = {
  getState: getStateFromSession,
  putState: putStateInSession,
  getTarget: getTargetFromSession,
  putTarget: putTargetInSession,
  getOAuth2Data: getOAuth2DataFromSession,
  putOAuth2Data: putOAuth2DataInSession,
  clearOAuth2Data: clearOAuth2DataInSession,
};
