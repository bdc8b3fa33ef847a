export { WriteLock, sharedWriteLock, type ReleaseFn } from './write-lock.js';
export {
  TransferWriter,
  resolveDestination,
  describeIoError,
  ATTRIBUTION_SUFFIX,
  type TransferWriterConfig,
  type TransferWriteRequest,
  type TransferWriteOptions,
  type TransferWriteResult,
} from './transfer-writer.js';
