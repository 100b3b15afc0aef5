/**
 * S3 Multipart Calls
 *
 * Part-level multipart operations through the AWS SDK. Each part request
 * carries the transfer's abort signal.
 */

import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  S3Client,
  UploadPartCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type { StorageTarget } from '@skyrelay/core';
import type { CompletedPart, MultipartApi, PartUpload } from './multipart.js';

export function toS3ClientConfig(target: StorageTarget): S3ClientConfig {
  const autoRegion = target.signing === 'sigv4-auto-region';

  return {
    endpoint: target.endpoint,
    region: autoRegion ? 'auto' : target.region,
    forcePathStyle: autoRegion,
    credentials: {
      accessKeyId: target.credentials.accessKeyId,
      secretAccessKey: target.credentials.secretAccessKey,
    },
    // Several S3-compatible providers reject the SDK's default CRC32 headers
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  };
}

export class S3MultipartApi implements MultipartApi {
  constructor(private readonly client: S3Client) {}

  static forTarget(target: StorageTarget): S3MultipartApi {
    return new S3MultipartApi(new S3Client(toS3ClientConfig(target)));
  }

  async createUpload(bucket: string, key: string, contentType: string): Promise<string> {
    const result = await this.client.send(new CreateMultipartUploadCommand({
      Bucket: bucket,
      Key: key,
      ContentType: contentType,
    }));
    if (!result.UploadId) {
      throw new Error(`No upload id returned for ${key}`);
    }
    return result.UploadId;
  }

  async uploadPart(part: PartUpload): Promise<string> {
    const result = await this.client.send(
      new UploadPartCommand({
        Bucket: part.bucket,
        Key: part.key,
        UploadId: part.uploadId,
        PartNumber: part.partNumber,
        Body: part.body,
        ContentLength: part.body.length,
      }),
      { abortSignal: part.signal }
    );
    if (!result.ETag) {
      throw new Error(`No ETag returned for part ${part.partNumber} of ${part.key}`);
    }
    return result.ETag;
  }

  async completeUpload(
    bucket: string,
    key: string,
    uploadId: string,
    parts: readonly CompletedPart[]
  ): Promise<string> {
    const result = await this.client.send(new CompleteMultipartUploadCommand({
      Bucket: bucket,
      Key: key,
      UploadId: uploadId,
      MultipartUpload: {
        Parts: parts.map((part) => ({ PartNumber: part.partNumber, ETag: part.etag })),
      },
    }));
    return result.ETag ?? '';
  }

  async abortUpload(bucket: string, key: string, uploadId: string): Promise<void> {
    await this.client.send(new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId }));
  }
}
