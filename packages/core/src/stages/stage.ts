import type { Handler, InterceptedRequest, InterceptedResponse } from '#types';

/** names of the pipeline stages, outermost first */
export type StageName =
  | 'logout'
  | 'logout-callback'
  | 'authorization-callback'
  | 'inject-oauth2-data'
  | 'validate-and-refresh';

/**
 * one decision step of the interceptor pipeline
 *
 * a stage whose trigger matches owns the response: it either answers on its
 * own or calls `next` to hand the request to the stages below it.
 */
export interface Stage {
  /** stage name, used in logs */
  name: StageName;
  /**
   * tells whether the stage acts on the request
   * @param request incoming request
   * @returns true if `handle` must run
   */
  matches(request: InterceptedRequest): boolean;
  /**
   * processes a matching request
   * @param request incoming request
   * @param next remainder of the pipeline including the downstream handler
   * @returns response for the request
   */
  handle(
    request: InterceptedRequest,
    next: Handler,
  ): Promise<InterceptedResponse>;
}
