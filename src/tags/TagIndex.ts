/**
 * TagIndex: in-memory tag index with its derived reverse lookups.
 *
 *   fileTags    file → tags            (owned)
 *   tagTypes    type → values in use   (derived)
 *   tagToFiles  tag  → files           (derived, read by the query evaluator)
 *
 * The derived maps are updated in the same call as fileTags and pruned the
 * moment their last file/tag pair disappears. The class is synchronous and
 * unlocked; TagManager owns locking and persistence.
 */

import { invalidTagFormat, tagNotFound } from '../errors/NexusError.js';
import type { TagsSnapshot } from '../storage/types.js';

export interface ParsedTag {
  type: string;
  value: string;
}

/**
 * Split a tag into type and value. Returns null unless the tag has exactly
 * one `:` with text on both sides.
 */
export function parseTag(tag: string): ParsedTag | null {
  const parts = tag.split(':');
  if (parts.length !== 2) {
    return null;
  }
  const [type, value] = parts;
  if (!type || !value) {
    return null;
  }
  return { type, value };
}

export function validateTag(tag: string): void {
  if (parseTag(tag) === null) {
    throw invalidTagFormat(tag);
  }
}

export interface TagIndexStats {
  taggedFiles: number;
  distinctTags: number;
  tagTypes: number;
}

export class TagIndex {
  private readonly fileTags = new Map<string, Set<string>>();
  private readonly tagTypes = new Map<string, Set<string>>();
  private readonly tagToFiles = new Map<string, Set<string>>();

  static fromSnapshot(snapshot: TagsSnapshot): TagIndex {
    const index = new TagIndex();
    index.load(snapshot);
    return index;
  }

  /**
   * Replace the whole index with the snapshot's content.
   */
  load(snapshot: TagsSnapshot): void {
    this.fileTags.clear();
    this.tagTypes.clear();
    this.tagToFiles.clear();

    for (const [file, tags] of Object.entries(snapshot.fileTags)) {
      for (const tag of tags) {
        this.insert(file, tag);
      }
    }
  }

  toSnapshot(): TagsSnapshot {
    const fileTags: Record<string, string[]> = {};
    for (const [file, tags] of this.fileTags) {
      fileTags[file] = [...tags].sort();
    }
    return { fileTags };
  }

  /**
   * Add tags to a file. Every tag is validated before anything changes.
   * Returns the tags that were not already present.
   */
  addTags(file: string, tags: readonly string[]): string[] {
    for (const tag of tags) {
      validateTag(tag);
    }

    const added: string[] = [];
    for (const tag of tags) {
      if (this.insert(file, tag)) {
        added.push(tag);
      }
    }
    return added;
  }

  /**
   * Remove tags from a file. Every tag must be present; the check runs
   * before any removal. A file left with no tags loses its entry.
   */
  removeTags(file: string, tags: readonly string[]): string[] {
    const current = this.fileTags.get(file);
    if (!current) {
      // Caller maps this to FileNotFound with its own context.
      return [];
    }
    for (const tag of tags) {
      if (!current.has(tag)) {
        throw tagNotFound(tag, file);
      }
    }

    const removed: string[] = [];
    for (const tag of tags) {
      if (this.delete(file, tag)) {
        removed.push(tag);
      }
    }
    return removed;
  }

  hasFile(file: string): boolean {
    return this.fileTags.has(file);
  }

  getFileTags(file: string): string[] {
    const tags = this.fileTags.get(file);
    return tags ? [...tags].sort() : [];
  }

  /**
   * All tag values grouped by type, values sorted.
   */
  getAllTags(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const type of [...this.tagTypes.keys()].sort()) {
      const values = this.tagTypes.get(type);
      if (values) {
        result[type] = [...values].sort();
      }
    }
    return result;
  }

  /** Every file with at least one tag. */
  files(): string[] {
    return [...this.fileTags.keys()].sort();
  }

  /** Read-only view of tag → files for the query evaluator. */
  tagFiles(): ReadonlyMap<string, ReadonlySet<string>> {
    return this.tagToFiles;
  }

  /** The universe used by NOT. */
  universe(): ReadonlySet<string> {
    return new Set(this.fileTags.keys());
  }

  getStats(): TagIndexStats {
    return {
      taggedFiles: this.fileTags.size,
      distinctTags: this.tagToFiles.size,
      tagTypes: this.tagTypes.size,
    };
  }

  private insert(file: string, tag: string): boolean {
    let tags = this.fileTags.get(file);
    if (!tags) {
      tags = new Set();
      this.fileTags.set(file, tags);
    }
    if (tags.has(tag)) {
      return false;
    }
    tags.add(tag);

    const parsed = parseTag(tag);
    if (parsed) {
      let values = this.tagTypes.get(parsed.type);
      if (!values) {
        values = new Set();
        this.tagTypes.set(parsed.type, values);
      }
      values.add(parsed.value);
    }

    let files = this.tagToFiles.get(tag);
    if (!files) {
      files = new Set();
      this.tagToFiles.set(tag, files);
    }
    files.add(file);
    return true;
  }

  private delete(file: string, tag: string): boolean {
    const tags = this.fileTags.get(file);
    if (!tags || !tags.delete(tag)) {
      return false;
    }
    if (tags.size === 0) {
      this.fileTags.delete(file);
    }

    const files = this.tagToFiles.get(tag);
    if (files) {
      files.delete(file);
      if (files.size === 0) {
        this.tagToFiles.delete(tag);

        const parsed = parseTag(tag);
        if (parsed) {
          const values = this.tagTypes.get(parsed.type);
          if (values) {
            values.delete(parsed.value);
            if (values.size === 0) {
              this.tagTypes.delete(parsed.type);
            }
          }
        }
      }
    }
    return true;
  }
}
