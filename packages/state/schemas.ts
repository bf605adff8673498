import { z } from 'zod';
import type { EpisodeCatalogFile, RemoteItem, StateEntry, StateFile } from '@tube-to-pod/types';

export const IsoDateString = z.string().refine(value => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid ISO 8601 date',
});

export const RemoteItemSchema: z.ZodType<RemoteItem, z.ZodTypeDef, unknown> = z.object({
  identity: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  publishedAt: IsoDateString,
  durationHintSeconds: z.number().nonnegative().optional(),
});

export const StateEntrySchema: z.ZodType<StateEntry, z.ZodTypeDef, unknown> = z.object({
  status: z.enum(['seen', 'processed']),
  firstSeenAt: IsoDateString,
  processedAt: IsoDateString.optional(),
  attempts: z.number().int().nonnegative().default(0),
  lastError: z.string().optional(),
  item: RemoteItemSchema.optional(),
});

export const StateFileSchema: z.ZodType<StateFile, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1),
  lastCheckedAt: IsoDateString.nullable(),
  entries: z.record(StateEntrySchema),
});

export const EpisodeRecordSchema = z.object({
  identity: z.string().min(1),
  title: z.string(),
  description: z.string(),
  publishedAt: IsoDateString,
  audioUrl: z.string().url(),
  audioKey: z.string().min(1),
  byteLength: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  episodeNumber: z.number().int().positive(),
  reference: z.string().optional(),
  processedAt: IsoDateString,
});

export const EpisodeCatalogFileSchema: z.ZodType<EpisodeCatalogFile, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1),
  lastUpdated: IsoDateString,
  episodes: z.array(EpisodeRecordSchema),
});
