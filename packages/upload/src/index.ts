/**
 * @skyrelay/upload
 *
 * Multi-destination replication.
 *
 * - Transfer client contract, the MinIO-backed implementation and multipart uploads
 * - Target connection and bucket checks
 * - Capacity guard, progress tracking, replication engine and ledger
 * - Presigned link publishing and the link report
 */

// Transfer clients
export type {
  BucketProbe,
  ObjectEntry,
  UploadRequest,
  UploadReceipt,
  TransferClient,
  TransferClientFactory,
} from './targets/transferClient.js';
export {
  MinioTransferClient,
  createTransferClient,
  createMinioClient,
  toMinioConfig,
  getMimeType,
  MIN_PART_SIZE_BYTES,
  type MinioCalls,
  type MinioConfig,
} from './targets/minio.js';
export {
  uploadInParts,
  partSizeFor,
  planParts,
  MAX_PARTS,
  MAX_PART_SIZE_BYTES,
  type MultipartApi,
  type MultipartUploadOptions,
  type PartPlan,
  type PartUpload,
  type CompletedPart,
} from './targets/multipart.js';
export { S3MultipartApi, toS3ClientConfig } from './targets/s3Multipart.js';

// Connection and usage
export {
  connectTargets,
  ensureBucket,
  type ConnectedTarget,
  type ConnectionState,
  type ConnectOptions,
} from './connect.js';
export { measureUsage, type BucketUsage } from './usage.js';

// Replication
export { CapacityGuard } from './capacityGuard.js';
export {
  ProgressTracker,
  type ProgressSink,
  type ProgressSnapshot,
  type ProgressTrackerOptions,
} from './progress.js';
export { ReplicationLedger } from './ledger.js';
export {
  ReplicationEngine,
  NO_RETRY,
  DEFAULT_TRANSFER_TIMEOUT_MS,
  DEFAULT_PART_SIZE_BYTES,
  DEFAULT_MAX_CONCURRENT_PARTS,
  type RetryPolicy,
  type ReplicationEngineOptions,
  type ReplicationResult,
  type TargetAssessment,
  type TransferStartEvent,
  type TransferProgressEvent,
} from './engine.js';
export { scanSourceDirectory, totalBytes } from './scanner.js';

// Links
export {
  LinkPublisher,
  effectiveExpiry,
  publicObjectUrl,
  DEFAULT_LINK_EXPIRY_SECONDS,
  type PublishedLink,
  type LinkFailure,
  type LinkSection,
} from './linkPublisher.js';
export { renderLinkReport, describeExpiry, type LinkReportOptions } from './report.js';
