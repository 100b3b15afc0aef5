/**
 * @skyrelay/core
 *
 * Core domain package containing:
 * - Storage target descriptors
 * - Upload items, capacity decisions and transfer outcomes
 * - Error classes
 */

// Types
export type {
  SigningStyle,
  TargetCredentials,
  CapacityPolicy,
  StorageTarget,
} from './types/target.js';

export type {
  UploadItem,
  CapacityVerdict,
  CapacityDecision,
  SucceededOutcome,
  ClientUnavailableOutcome,
  CapacityRejectedOutcome,
  TransferFailedOutcome,
  TransferOutcome,
  TransferStatus,
} from './types/transfer.js';

// Errors
export {
  ReplicationError,
  ConfigurationError,
  SourceDirectoryError,
  NoFilesFoundError,
  NoEligibleTargetsError,
  TargetInitializationError,
  BucketUnavailableError,
  TransferCancelledError,
  isReplicationError,
} from './errors/index.js';
