import { generateUlid } from '@kitchenflow/shared';

export type ActorType = 'user' | 'system';

export interface Actor {
  id: string;
  type: ActorType;
  name?: string;
}

/** Actor recorded for every action the engine takes on its own. */
export const SYSTEM_ACTOR: Actor = Object.freeze({ id: 'system', type: 'system', name: 'System' });

/**
 * Everything a kitchen operation needs to know about its caller. Built by
 * the transport layer per request, or by the worker per scheduled tick.
 */
export interface RequestContext {
  hubId: string;
  actor: Actor;
  requestId: string;
  /** Terminal or device that issued the request, when known. */
  deviceId?: string;
}

export function createRequestContext(
  hubId: string,
  actor: Actor,
  overrides: Partial<Omit<RequestContext, 'hubId' | 'actor'>> = {},
): RequestContext {
  return {
    hubId,
    actor,
    requestId: overrides.requestId ?? generateUlid(),
    deviceId: overrides.deviceId,
  };
}

export function createSystemContext(hubId: string, requestId?: string): RequestContext {
  return createRequestContext(hubId, SYSTEM_ACTOR, { requestId });
}
