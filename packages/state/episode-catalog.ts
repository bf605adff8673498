import { CorruptStateError, DuplicateIdentityError } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import type { EpisodeRecord } from '@tube-to-pod/types';
import { readJsonFile, writeJsonAtomic } from './atomic-file.js';
import { EpisodeCatalogFileSchema } from './schemas.js';

const log = getLogger('episode-catalog');

/**
 * Append-only ledger of published episodes. Records are never edited or removed
 * by the pipeline; corrections are an out-of-band edit of episodes.json.
 */
export class EpisodeCatalog {
  private readonly records: EpisodeRecord[];
  private readonly identities: Set<string>;

  private constructor(readonly filePath: string, records: EpisodeRecord[]) {
    this.records = [];
    this.identities = new Set();
    for (const record of records) {
      this.insert(record);
    }
  }

  static empty(filePath: string): EpisodeCatalog {
    return new EpisodeCatalog(filePath, []);
  }

  static async load(filePath: string): Promise<EpisodeCatalog> {
    const file = await readJsonFile(filePath, EpisodeCatalogFileSchema);
    if (!file) {
      log.info(`Episode catalog not found at ${filePath}, creating a new one.`);
      return EpisodeCatalog.empty(filePath);
    }
    try {
      return new EpisodeCatalog(filePath, file.episodes);
    } catch (error) {
      // A hand edit introduced a duplicate; refuse to guess which record is the real one
      if (error instanceof DuplicateIdentityError) {
        throw new CorruptStateError(filePath, `duplicate episode identity ${error.identity}`, { cause: error });
      }
      throw error;
    }
  }

  get size(): number {
    return this.records.length;
  }

  has(identity: string): boolean {
    return this.identities.has(identity);
  }

  /** Copies, in catalog (append) order */
  all(): EpisodeRecord[] {
    return this.records.map(record => ({ ...record }));
  }

  append(record: EpisodeRecord): void {
    this.insert(record);
    log.debug(`Appended ${record.identity} to the catalog (now ${this.size} episodes)`);
  }

  private insert(record: EpisodeRecord): void {
    if (this.identities.has(record.identity)) {
      throw new DuplicateIdentityError(record.identity);
    }
    this.records.push({ ...record });
    this.identities.add(record.identity);
  }

  async persist(now: Date = new Date()): Promise<void> {
    await writeJsonAtomic(this.filePath, {
      version: 1,
      lastUpdated: now.toISOString(),
      episodes: this.records,
    });
    log.debug(`Episode catalog saved to ${this.filePath}`);
  }
}
