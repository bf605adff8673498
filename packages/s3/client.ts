import fs from 'fs-extra';
import path from 'path';
import type { Readable } from 'stream';
import { S3 } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getLogger } from '@tube-to-pod/logging';

const log = getLogger('s3');

export type FileStorageEnv = 'local' | 's3';

export interface SaveFileOptions {
  /** Whole-upload deadline for S3; the multipart upload is aborted when it passes */
  timeoutMs?: number;
}

const S3_CONNECTION_TIMEOUT_MS = 10_000;
// Per-socket idle limit, so a stalled part fails instead of hanging
const S3_SOCKET_TIMEOUT_MS = 60_000;

// Dynamic lookups instead of constants so tests (and scripts) can switch modes via env
function getFileStorageEnv(): FileStorageEnv {
  return process.env.FILE_STORAGE_ENV === 'local' ? 'local' : 's3';
}

function getLocalStoragePath(): string {
  return path.resolve(process.env.LOCAL_STORAGE_PATH || './local-storage');
}

// Lazy initialization of S3 client - only create when needed for remote operations
let s3Instance: S3 | null = null;
function getS3Client(): S3 {
  if (!s3Instance) {
    const endpoint = process.env.S3_ENDPOINT;
    s3Instance = new S3({
      region: process.env.S3_REGION || process.env.AWS_REGION || 'us-east-1',
      requestHandler: {
        connectionTimeout: S3_CONNECTION_TIMEOUT_MS,
        requestTimeout: S3_SOCKET_TIMEOUT_MS,
      },
      // S3-compatible stores (Backblaze B2, MinIO) are addressed through a custom endpoint
      ...(endpoint ? { endpoint, forcePathStyle: true } : {}),
    });
  }
  return s3Instance;
}

function getBucketName(): string {
  const bucketName = process.env.S3_BUCKET;
  if (!bucketName) {
    throw new Error('S3_BUCKET environment variable not set. It is required when FILE_STORAGE_ENV=s3.');
  }
  return bucketName;
}

/**
 * Resolve a local file path from a storage key.
 * Keys that would escape the storage directory are rejected.
 */
function getLocalFilePath(key: string): string {
  const root = getLocalStoragePath();
  const resolved = path.resolve(root, key);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    throw new Error(`Storage key "${key}" resolves outside ${root}`);
  }
  return resolved;
}

function getPublicBaseUrl(): string {
  const baseUrl = process.env.PUBLIC_BASE_URL;
  if (!baseUrl) {
    throw new Error('PUBLIC_BASE_URL environment variable not set. Public URLs are derived from it.');
  }
  return baseUrl.replace(/\/+$/, '');
}

/**
 * Public URL of a stored object. Deterministic from the key, so it can be
 * recomputed without querying the store.
 */
export function getPublicUrl(key: string): string {
  const encodedKey = key
    .replace(/^\/+/, '')
    .split('/')
    .map(segment => encodeURIComponent(segment))
    .join('/');
  return `${getPublicBaseUrl()}/${encodedKey}`;
}

/**
 * Save content to S3 or local storage. Streams are uploaded in parts.
 */
export async function saveFile(
  key: string,
  content: Buffer | string | Readable,
  contentType?: string,
  options: SaveFileOptions = {}
): Promise<void> {
  if (getFileStorageEnv() === 'local') {
    const localPath = getLocalFilePath(key);
    await fs.ensureDir(path.dirname(localPath));
    if (typeof content === 'string' || Buffer.isBuffer(content)) {
      await fs.writeFile(localPath, content);
    } else {
      await new Promise<void>((resolve, reject) => {
        const output = fs.createWriteStream(localPath);
        content.on('error', reject);
        output.on('error', reject);
        output.on('finish', () => resolve());
        content.pipe(output);
      });
    }
    return;
  }

  const parallelUpload = new Upload({
    client: getS3Client(),
    params: {
      Bucket: getBucketName(),
      Key: key,
      Body: content,
      ContentType: contentType,
    },
    partSize: 20 * 1024 * 1024, // 20MB parts
    queueSize: 4, // 4 concurrent uploads
  });

  parallelUpload.on('httpUploadProgress', (progress) => {
    if (progress.total && progress.loaded && progress.part) {
      const percentage = (progress.loaded / progress.total) * 100;
      log.debug(`Upload progress for ${key}: ${percentage.toFixed(2)}%, part ${progress.part}`);
    }
  });

  const { timeoutMs } = options;
  if (!timeoutMs) {
    await parallelUpload.done();
    return;
  }

  let timeout: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      log.warn(`Upload of ${key} timed out after ${timeoutMs}ms, aborting`);
      reject(new Error(`Upload of ${key} timed out after ${timeoutMs}ms`));
      parallelUpload.abort().catch((abortError: unknown) => {
        log.warn(`Could not abort the upload of ${key}:`, abortError);
      });
    }, timeoutMs);
  });

  try {
    await Promise.race([parallelUpload.done(), deadline]);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Upload a local file without loading it into memory
 */
export async function uploadLocalFile(
  localPath: string,
  key: string,
  contentType?: string,
  options: SaveFileOptions = {}
): Promise<void> {
  const stream = fs.createReadStream(localPath);
  try {
    await saveFile(key, stream, contentType, options);
  } finally {
    // An aborted upload stops reading without closing the file
    stream.destroy();
  }
}

// Export internal functions for testing
export {
  getFileStorageEnv,
  getLocalStoragePath,
  getLocalFilePath,
  getBucketName,
  getPublicBaseUrl,
};
