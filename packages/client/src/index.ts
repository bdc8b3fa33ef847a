/**
 * @deptdrop/client
 *
 * Upload client: connect, authenticate, stream one file to a department.
 */

export {
  type ClientConfig,
  type ResolvedClientConfig,
  type TransferProgress,
  DEFAULT_CLIENT_CONFIG,
  resolveClientConfig,
  clientConfigFromEnv,
  loadClientConfig,
} from './config.js';

export {
  TransferClient,
  type Credentials,
  type AuthenticationResult,
  type TransferResult,
} from './transfer-client.js';

export { uploadFile, type UploadOptions } from './upload.js';

export {
  type Prompter,
  createPrompter,
  promptCredentials,
  promptFilePath,
  promptDepartment,
  DEPARTMENT_MENU,
} from './prompts.js';

export { runInteractiveUpload } from './interactive.js';
