/**
 * Snapshot shapes for the persisted datasets.
 *
 * Each dataset is written as one JSON document and fully replaced on save.
 */

import { z } from 'zod';

export const TagsSnapshotSchema = z.object({
  fileTags: z.record(z.string(), z.array(z.string())),
});

export const RelationSchema = z.object({
  target: z.string(),
  description: z.string(),
});

export const RelationsSnapshotSchema = z.object({
  fileRelations: z.record(z.string(), z.array(RelationSchema)),
});

export const CommentsSnapshotSchema = z.object({
  fileComments: z.record(z.string(), z.string()),
});

/** file path → tag strings (order carries no meaning) */
export type TagsSnapshot = z.infer<typeof TagsSnapshotSchema>;

/** source file path → outgoing relations in insertion order */
export type RelationsSnapshot = z.infer<typeof RelationsSnapshotSchema>;

/** file path → comment text */
export type CommentsSnapshot = z.infer<typeof CommentsSnapshotSchema>;

/**
 * Persistence gateway for one dataset.
 */
export interface SnapshotStore<T> {
  /** Path of the backing file (for diagnostics). */
  readonly path: string;

  /** Load the snapshot; a missing or blank store yields the default snapshot. */
  load(): Promise<T>;

  /** Replace the stored snapshot. */
  save(snapshot: T): Promise<void>;
}

export const DATASET_FILES = {
  tags: 'tags.json',
  relations: 'relations.json',
  comments: 'comments.json',
} as const;
