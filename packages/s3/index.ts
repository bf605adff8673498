// Re-export all functions from the client module
export {
  saveFile,
  uploadLocalFile,
  getPublicUrl,
  // Export internal functions for testing
  getFileStorageEnv,
  getLocalStoragePath,
  getLocalFilePath,
  getBucketName,
  getPublicBaseUrl,
} from './client.js';

export type { FileStorageEnv, SaveFileOptions } from './client.js';
export { createObjectStorage } from './object-storage.js';
export type { ObjectStorageOptions } from './object-storage.js';
