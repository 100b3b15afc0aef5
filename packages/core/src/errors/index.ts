/**
 * Custom Error Classes
 */

import type { CapacityDecision } from '../types/transfer.js';

/**
 * Base error class for all skyrelay errors
 */
export class ReplicationError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReplicationError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid environment, targets file, or command option
 */
export class ConfigurationError extends ReplicationError {
  constructor(field: string, message: string) {
    super(
      `Invalid configuration for ${field}: ${message}`,
      'CONFIGURATION_ERROR',
      { field, message }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Source folder is missing or not a directory
 */
export class SourceDirectoryError extends ReplicationError {
  constructor(path: string, message: string) {
    super(
      `Source folder ${path}: ${message}`,
      'SOURCE_NOT_FOUND',
      { path }
    );
    this.name = 'SourceDirectoryError';
  }
}

/**
 * Terminal: the source folder holds nothing to upload
 */
export class NoFilesFoundError extends ReplicationError {
  constructor() {
    super('No files found to upload', 'NO_FILES_FOUND');
    this.name = 'NoFilesFoundError';
  }
}

/**
 * Terminal: every target is disabled, unavailable, or over capacity
 */
export class NoEligibleTargetsError extends ReplicationError {
  public readonly decisions: readonly CapacityDecision[];

  constructor(decisions: readonly CapacityDecision[]) {
    super(
      'No eligible targets: every target is disabled, unavailable, or over capacity',
      'NO_ELIGIBLE_TARGETS',
      { targets: decisions.map((d) => ({ target: d.target, reason: d.reason })) }
    );
    this.name = 'NoEligibleTargetsError';
    this.decisions = decisions;
  }
}

/**
 * Client for a target could not be constructed
 */
export class TargetInitializationError extends ReplicationError {
  constructor(target: string, cause: string) {
    super(
      `Failed to initialize ${target} client: ${cause}`,
      'TARGET_INITIALIZATION_FAILED',
      { target, cause }
    );
    this.name = 'TargetInitializationError';
  }
}

/**
 * Bucket does not exist and could not be created, or could not be checked
 */
export class BucketUnavailableError extends ReplicationError {
  constructor(target: string, bucket: string, cause: string) {
    super(
      `Bucket '${bucket}' unavailable on ${target}: ${cause}`,
      'BUCKET_UNAVAILABLE',
      { target, bucket, cause }
    );
    this.name = 'BucketUnavailableError';
  }
}

/**
 * A transfer was stopped by its deadline or by run cancellation
 */
export class TransferCancelledError extends ReplicationError {
  constructor(target: string, key: string, cause: 'timeout' | 'aborted') {
    super(
      cause === 'timeout'
        ? `Transfer of ${key} to ${target} exceeded its deadline`
        : `Transfer of ${key} to ${target} was cancelled`,
      'TRANSFER_CANCELLED',
      { target, key, cause }
    );
    this.name = 'TransferCancelledError';
  }
}

export function isReplicationError(error: unknown): error is ReplicationError {
  return error instanceof ReplicationError;
}
