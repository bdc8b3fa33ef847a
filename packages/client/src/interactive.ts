import type { Prompter } from './prompts.js';
import { promptCredentials, promptDepartment, promptFilePath } from './prompts.js';
import type { TransferClient, TransferResult } from './transfer-client.js';

/**
 * Connect, ask for credentials, and only once the server accepts them ask
 * which file to send and where.
 */
export async function runInteractiveUpload(
  client: TransferClient,
  prompter: Prompter,
  log: (line: string) => void = console.log,
): Promise<TransferResult> {
  log(`Connecting to server at ${client.target}...`);
  await client.connect();
  log('Connected to server.');

  const credentials = await promptCredentials(prompter);
  const auth = await client.authenticate(credentials);
  log(`Server response: ${auth.message}`);

  const filePath = await promptFilePath(prompter);
  const department = await promptDepartment(prompter, log);
  return client.transfer(filePath, department);
}
