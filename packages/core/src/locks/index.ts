export { withKeyedLock, isKeyLocked, getKeyedLockStats } from './keyed-lock';
