export * from './types.js';
export { FleetStateStore, type StateStore, parseFleetState, serializeFleetState, stateFilePath } from './store.js';
export { acquireLock, lockFilePath, type RunLock } from './lock.js';
