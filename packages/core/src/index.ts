export { logger, log, setLogLevel, getLogLevel, setLogSink, serializeError } from './observability/logger';
export type { LogLevel, LogEntry, LogSink } from './observability/logger';
export { SYSTEM_ACTOR, createRequestContext, createSystemContext } from './auth/context';
export type { Actor, ActorType, RequestContext } from './auth/context';
export {
  getEventBus,
  setEventBus,
  InMemoryEventBus,
  buildEvent,
  buildEventFromContext,
} from './events';
export type { EventBus, EventHandler, DeadLetter, InMemoryEventBusOptions } from './events';
export { withKeyedLock, isKeyLocked, getKeyedLockStats } from './locks';
export { getDeploymentConfig, resetDeploymentConfig } from './config';
export type { DeploymentConfig, DeploymentTarget } from './config';
