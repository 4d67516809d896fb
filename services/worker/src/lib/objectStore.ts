/**
 * Artifact Store Client (S3/MinIO/Spaces)
 *
 * Stores captured archives under deterministic keys. Uploading the same bytes to
 * the same key twice leaves one object and returns the same reference.
 */

import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  type GetObjectCommandOutput,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { createHash } from 'crypto';
import { Readable } from 'stream';
import { loadConfig } from './config.js';
import {
  ArtifactNotFoundError,
  PermanentExternalError,
  TransientExternalError,
} from './errors.js';

const SERVICE = 'object-store';

export const WACZ_CONTENT_TYPE = 'application/wacz+zip';

/**
 * Capabilities the pipeline needs from durable blob storage
 */
export interface ArtifactStore {
  /** Store bytes under `key` and return the stored reference */
  put(key: string, bytes: Buffer | Uint8Array, contentType?: string): Promise<string>;
  get(key: string): Promise<Readable>;
  /** Time-limited download link for a reference returned by put() */
  getDownloadUrl(reference: string, expiresInSeconds: number): Promise<string>;
}

export function sha256Hex(bytes: Buffer | Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Translate an SDK failure into the pipeline's error taxonomy
 */
export function classifyS3Error(error: unknown, key: string): Error {
  if (error instanceof S3ServiceException) {
    const statusCode = error.$metadata.httpStatusCode;

    if (error.name === 'NoSuchKey' || error.name === 'NotFound' || statusCode === 404) {
      return new ArtifactNotFoundError(key);
    }
    if (
      error.$fault === 'server' ||
      (statusCode !== undefined && statusCode >= 500) ||
      statusCode === 429 ||
      error.name === 'SlowDown' ||
      error.name === 'RequestTimeout'
    ) {
      return new TransientExternalError(SERVICE, `${error.name}: ${error.message}`, statusCode);
    }
    return new PermanentExternalError(SERVICE, `${error.name}: ${error.message}`, statusCode);
  }

  // Socket resets, DNS failures, SDK timeouts
  const message = error instanceof Error ? error.message : String(error);
  return new TransientExternalError(SERVICE, message);
}

/**
 * HeadObject answers a missing key with 403 instead of 404 when the credentials
 * lack s3:ListBucket, so a 403 there reads as absent
 */
export function classifyHeadError(error: unknown, key: string): Error {
  if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 403) {
    return new ArtifactNotFoundError(key);
  }
  return classifyS3Error(error, key);
}

/**
 * Get S3 client configured for the environment
 */
export function createS3Client(): S3Client {
  const config = loadConfig();

  const clientConfig: S3ClientConfig = {
    region: config.s3Region,
    credentials: {
      accessKeyId: config.s3AccessKeyId,
      secretAccessKey: config.s3SecretAccessKey,
    },
  };

  // MinIO / Spaces configuration
  if (config.s3Endpoint) {
    clientConfig.endpoint = config.s3Endpoint;
    clientConfig.forcePathStyle = config.s3ForcePathStyle;
  }

  return new S3Client(clientConfig);
}

export class S3ArtifactStore implements ArtifactStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async put(
    key: string,
    bytes: Buffer | Uint8Array,
    contentType: string = WACZ_CONTENT_TYPE
  ): Promise<string> {
    const digest = sha256Hex(bytes);

    // A previous attempt may have finished the upload before the status write failed
    const existingDigest = await this.headDigest(key);
    if (existingDigest === digest) {
      return key;
    }

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: bytes,
          ContentType: contentType,
          ContentLength: bytes.byteLength,
          Metadata: { sha256: digest },
        })
      );
    } catch (error) {
      throw classifyS3Error(error, key);
    }

    return key;
  }

  async get(key: string): Promise<Readable> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
    } catch (error) {
      throw classifyS3Error(error, key);
    }

    if (!response.Body) {
      throw new ArtifactNotFoundError(key);
    }

    // Node.js runtime hands back an IncomingMessage
    if (response.Body instanceof Readable) {
      return response.Body;
    }

    const bytes = await response.Body.transformToByteArray();
    return Readable.from(Buffer.from(bytes));
  }

  async getDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    const existingDigest = await this.headDigest(key);
    if (existingDigest === null) {
      throw new ArtifactNotFoundError(key);
    }

    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      { expiresIn: expiresInSeconds }
    );
  }

  /**
   * SHA-256 recorded on an existing object, '' when it has none, null when absent
   */
  private async headDigest(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return response.Metadata?.sha256 ?? '';
    } catch (error) {
      const classified = classifyHeadError(error, key);
      if (classified instanceof ArtifactNotFoundError) {
        return null;
      }
      throw classified;
    }
  }
}

let defaultStore: S3ArtifactStore | null = null;

export function getArtifactStore(): S3ArtifactStore {
  if (!defaultStore) {
    defaultStore = new S3ArtifactStore(createS3Client(), loadConfig().s3Bucket);
  }
  return defaultStore;
}
