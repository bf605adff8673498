import type { ObjectStorage } from '@tube-to-pod/types';
import { getLogger } from '@tube-to-pod/logging';
import { getFileStorageEnv, getPublicUrl, uploadLocalFile } from './client.js';

const log = getLogger('object-storage');

export interface ObjectStorageOptions {
  /** Deadline for each upload; none when omitted */
  uploadTimeoutMs?: number;
}

/**
 * ObjectStorage backed by the configured bucket (or the local storage directory
 * when FILE_STORAGE_ENV=local).
 */
export function createObjectStorage(options: ObjectStorageOptions = {}): ObjectStorage {
  return {
    async put(localPath: string, key: string, contentType: string): Promise<string> {
      const url = getPublicUrl(key);
      log.info(`⬆️  Uploading ${localPath} to ${key} (${getFileStorageEnv()})`);
      await uploadLocalFile(localPath, key, contentType, { timeoutMs: options.uploadTimeoutMs });
      log.info(`✅ Uploaded ${key}`);
      return url;
    },
    publicUrl(key: string): string {
      return getPublicUrl(key);
    },
  };
}
