export { type IdentityStore, isGroupMember } from './types.js';
export { MemoryIdentityStore, type MemoryIdentityStoreData } from './memory-identity-store.js';
export {
  HostIdentityStore,
  parsePasswdEntry,
  parseGroupEntry,
  type HostIdentityStoreConfig,
} from './host-identity-store.js';
export {
  IdentityResolver,
  pickDepartment,
  AUTH_FAILURE_MESSAGES,
  type ResolveResult,
} from './resolver.js';
