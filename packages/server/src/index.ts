/**
 * @deptdrop/server
 *
 * Upload server: identity resolution, department authorization, guarded
 * writes and the connection dispatcher.
 */

export {
  type ServerConfig,
  type ResolvedServerConfig,
  type ServerHooks,
  DEFAULT_SERVER_CONFIG,
  resolveServerConfig,
  serverConfigFromEnv,
  loadServerConfig,
} from './config.js';

export * from './identity/index.js';
export * from './writer/index.js';

export {
  TransferSession,
  type TransferSessionOptions,
  type SessionOutcome,
} from './session/transfer-session.js';

export {
  TransferServer,
  type TransferServerOptions,
  type ServerAddress,
} from './dispatcher/transfer-server.js';

export {
  ensureDepartmentRoots,
  type DepartmentRootStatus,
} from './bootstrap/department-roots.js';
