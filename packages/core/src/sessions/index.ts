export { SessionRegistry } from './registry.js';
export type { Session, SessionHandle, SessionRegistryOptions } from './registry.js';
