import { FEED_CONTENT_TYPE, FEED_STORAGE_KEY } from '@tube-to-pod/constants';
import { TransientIOError, describeError } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import { writeFileAtomic } from '@tube-to-pod/state';
import type { ObjectStorage } from '@tube-to-pod/types';

const log = getLogger('publish-feed');

export interface PublishFeedOptions {
  feedPath: string;
  /** Only used when `uploadToStorage` is set */
  storage?: ObjectStorage;
  uploadToStorage: boolean;
}

/** Returns the public feed URL when it was uploaded */
export async function publishFeed(xml: string, options: PublishFeedOptions): Promise<string | undefined> {
  try {
    await writeFileAtomic(options.feedPath, xml);
  } catch (error) {
    throw new TransientIOError('feed', `could not write ${options.feedPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  log.info(`📝 Feed written to ${options.feedPath}`);

  if (!options.uploadToStorage) {
    return undefined;
  }
  if (!options.storage) {
    throw new TransientIOError('feed', 'feed upload requested but no object storage was provided');
  }

  try {
    const url = await options.storage.put(options.feedPath, FEED_STORAGE_KEY, FEED_CONTENT_TYPE);
    log.info(`✅ Feed published at ${url}`);
    return url;
  } catch (error) {
    throw new TransientIOError('feed', `could not upload the feed: ${describeError(error)}`, { cause: error });
  }
}
