import * as xml2js from 'xml2js';
import { AUDIO_CONTENT_TYPE } from '@tube-to-pod/constants';
import type { EpisodeRecord, ShowConfig } from '@tube-to-pod/types';
import { formatDuration } from '@tube-to-pod/utils';

const ITUNES_NAMESPACE = 'http://www.itunes.com/dtds/podcast-1.0.dtd';
const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';

export interface RenderFeedOptions {
  /** Rendered as `lastBuildDate`; the only field that varies between runs */
  generatedAt: Date;
}

/** Newest-first by publish time, identity ascending on ties */
export function compareRecordsNewestFirst(a: EpisodeRecord, b: EpisodeRecord): number {
  const byDate = Date.parse(b.publishedAt) - Date.parse(a.publishedAt);
  if (byDate !== 0) {
    return byDate;
  }
  return a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0;
}

/** RFC 822 date, as RSS 2.0 requires for pubDate and lastBuildDate */
function toRfc822(value: string | Date): string {
  return new Date(value).toUTCString();
}

function renderItem(record: EpisodeRecord) {
  return {
    title: record.title,
    description: record.description,
    guid: { _: record.identity, $: { isPermaLink: 'false' } },
    pubDate: toRfc822(record.publishedAt),
    enclosure: {
      $: { url: record.audioUrl, length: String(record.byteLength), type: AUDIO_CONTENT_TYPE },
    },
    'itunes:duration': formatDuration(record.durationSeconds),
    'itunes:episode': String(record.episodeNumber),
    ...(record.reference ? { 'itunes:subtitle': `Reference: ${record.reference}` } : {}),
  };
}

function renderChannel(records: EpisodeRecord[], show: ShowConfig, generatedAt: Date) {
  return {
    title: show.title,
    link: show.website,
    description: show.description,
    language: show.language,
    lastBuildDate: toRfc822(generatedAt),
    ...(show.feedUrl
      ? { 'atom:link': { $: { href: show.feedUrl, rel: 'self', type: 'application/rss+xml' } } }
      : {}),
    'itunes:author': show.author,
    'itunes:summary': show.description,
    'itunes:explicit': show.explicit ? 'true' : 'false',
    'itunes:category': { $: { text: show.category } },
    ...(show.imageUrl ? { 'itunes:image': { $: { href: show.imageUrl } } } : {}),
    ...(show.email
      ? { 'itunes:owner': { 'itunes:name': show.author, 'itunes:email': show.email } }
      : {}),
    item: [...records].sort(compareRecordsNewestFirst).map(renderItem),
  };
}

/**
 * Render the whole feed from the full catalog. Pure: the same records, show
 * and generation time always produce the same document.
 */
export function renderFeed(records: EpisodeRecord[], show: ShowConfig, options: RenderFeedOptions): string {
  const builder = new xml2js.Builder({
    xmldec: { version: '1.0', encoding: 'UTF-8' },
    renderOpts: { pretty: true, indent: '  ', newline: '\n' },
  });

  return builder.buildObject({
    rss: {
      $: { version: '2.0', 'xmlns:itunes': ITUNES_NAMESPACE, 'xmlns:atom': ATOM_NAMESPACE },
      channel: renderChannel(records, show, options.generatedAt),
    },
  });
}
