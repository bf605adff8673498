import { getLogger } from '@tube-to-pod/logging';
import type { RemoteItem, RemoteListing } from '@tube-to-pod/types';

const log = getLogger('collect-recent-items');

export interface CollectOptions {
  since?: Date;
  /** Stop once this many items are collected; unbounded when omitted */
  maxItems?: number;
  /** Checked after every page; true ends the walk */
  isLastPage?: (items: RemoteItem[]) => boolean;
}

/**
 * Walk the listing's pages until it runs out, `maxItems` items are collected
 * or `isLastPage` says so. Items come back in listing order (newest-first for an uploads playlist).
 */
export async function collectRecentItems(
  listing: RemoteListing,
  channelId: string,
  options: CollectOptions
): Promise<RemoteItem[]> {
  const collected: RemoteItem[] = [];
  const requestedTokens = new Set<string>();
  const maxItems = options.maxItems ?? Infinity;
  let pageToken: string | undefined;

  do {
    const page = await listing.listRecent(channelId, { since: options.since, pageToken });
    collected.push(...page.items);
    pageToken = page.nextPageToken;

    if (options.isLastPage?.(page.items)) {
      break;
    }
    if (pageToken && requestedTokens.has(pageToken)) {
      log.warn(`Listing returned page token ${pageToken} twice, stopping.`);
      break;
    }
    if (pageToken) {
      requestedTokens.add(pageToken);
    }
  } while (pageToken && collected.length < maxItems);

  return collected.slice(0, maxItems);
}
