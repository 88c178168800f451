/**
 * RelationGraph: directed, described edges between project files.
 *
 * `forward` (source → outgoing relations) is the owned structure; `reverse`
 * (target → incoming relations) is derived from it and updated in the same
 * call. An ordered (source, target) pair carries at most one relation.
 */

import { relationAlreadyExists, relationNotFound } from '../errors/NexusError.js';
import type { RelationsSnapshot } from '../storage/types.js';

export interface Relation {
  target: string;
  description: string;
}

export interface IncomingRelation {
  source: string;
  description: string;
}

export interface RelationMatch {
  source: string;
  relation: Relation;
}

export interface RelationGraphStats {
  filesWithRelations: number;
  totalRelations: number;
  filesWithIncoming: number;
}

export type RelationGraphView = Record<string, Relation[]>;

export class RelationGraph {
  private readonly forward = new Map<string, Relation[]>();
  private readonly reverse = new Map<string, IncomingRelation[]>();

  static fromSnapshot(snapshot: RelationsSnapshot): RelationGraph {
    const graph = new RelationGraph();
    graph.load(snapshot);
    return graph;
  }

  load(snapshot: RelationsSnapshot): void {
    this.forward.clear();
    for (const [source, relations] of Object.entries(snapshot.fileRelations)) {
      if (relations.length > 0) {
        this.forward.set(
          source,
          relations.map((r) => ({ target: r.target, description: r.description })),
        );
      }
    }
    this.rebuildReverse();
  }

  toSnapshot(): RelationsSnapshot {
    const fileRelations: Record<string, Relation[]> = {};
    for (const [source, relations] of this.forward) {
      fileRelations[source] = relations.map((r) => ({ target: r.target, description: r.description }));
    }
    return { fileRelations };
  }

  hasRelation(source: string, target: string): boolean {
    return this.forward.get(source)?.some((r) => r.target === target) ?? false;
  }

  add(source: string, target: string, description: string): void {
    if (this.hasRelation(source, target)) {
      throw relationAlreadyExists(source, target);
    }

    const outgoing = this.forward.get(source) ?? [];
    outgoing.push({ target, description });
    this.forward.set(source, outgoing);

    const incoming = this.reverse.get(target) ?? [];
    incoming.push({ source, description });
    this.reverse.set(target, incoming);
  }

  remove(source: string, target: string): Relation {
    const outgoing = this.forward.get(source) ?? [];
    const position = outgoing.findIndex((r) => r.target === target);
    const removed = outgoing[position];
    if (position < 0 || removed === undefined) {
      throw relationNotFound(source, target);
    }

    outgoing.splice(position, 1);
    if (outgoing.length === 0) {
      this.forward.delete(source);
    }

    const incoming = (this.reverse.get(target) ?? []).filter((r) => r.source !== source);
    if (incoming.length === 0) {
      this.reverse.delete(target);
    } else {
      this.reverse.set(target, incoming);
    }

    return removed;
  }

  getOutgoing(file: string): Relation[] {
    return (this.forward.get(file) ?? []).map((r) => ({ ...r }));
  }

  getIncoming(file: string): IncomingRelation[] {
    return (this.reverse.get(file) ?? []).map((r) => ({ ...r }));
  }

  /**
   * Relations whose description contains `keyword`, ignoring case, grouped
   * by source path in ascending order.
   */
  queryByDescription(keyword: string): RelationMatch[] {
    const needle = keyword.toLowerCase();
    const matches: RelationMatch[] = [];
    for (const source of [...this.forward.keys()].sort()) {
      for (const relation of this.forward.get(source) ?? []) {
        if (relation.description.toLowerCase().includes(needle)) {
          matches.push({ source, relation: { ...relation } });
        }
      }
    }
    return matches;
  }

  /**
   * Breadth-first walk along outgoing edges starting at `file` (depth 0), so
   * every node is expanded at its shortest distance from the start.
   *
   * A node counts as visited once it has been reached. An expanded node
   * records only the edges leading to nodes not yet visited at that moment,
   * and nodes with nothing to record are left out, so a cycle back to an
   * earlier node never shows up as an edge. Nodes at `maxDepth` are reached
   * but not expanded.
   */
  getRelationGraph(file: string, maxDepth: number): RelationGraphView {
    const view: RelationGraphView = {};
    const visited = new Set<string>([file]);
    let frontier = [file];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const node of frontier) {
        const recorded: Relation[] = [];
        for (const relation of this.forward.get(node) ?? []) {
          if (visited.has(relation.target)) continue;
          visited.add(relation.target);
          recorded.push({ ...relation });
          next.push(relation.target);
        }
        if (recorded.length > 0) {
          view[node] = recorded;
        }
      }
      frontier = next;
    }

    return view;
  }

  /**
   * Drop edges whose source or target is no longer a file. Returns how many
   * edges were removed; each edge counts once.
   */
  prune(exists: ReadonlySet<string>): number {
    let removed = 0;
    for (const [source, relations] of [...this.forward]) {
      if (!exists.has(source)) {
        removed += relations.length;
        this.forward.delete(source);
        continue;
      }
      const kept = relations.filter((r) => exists.has(r.target));
      removed += relations.length - kept.length;
      if (kept.length === 0) {
        this.forward.delete(source);
      } else if (kept.length !== relations.length) {
        this.forward.set(source, kept);
      }
    }
    if (removed > 0) {
      this.rebuildReverse();
    }
    return removed;
  }

  /** Every file referenced as a source or a target. */
  referencedFiles(): string[] {
    const files = new Set<string>(this.forward.keys());
    for (const target of this.reverse.keys()) files.add(target);
    return [...files].sort();
  }

  /** Files with at least one outgoing relation. */
  sources(): string[] {
    return [...this.forward.keys()].sort();
  }

  getStats(): RelationGraphStats {
    let totalRelations = 0;
    for (const relations of this.forward.values()) {
      totalRelations += relations.length;
    }
    return {
      filesWithRelations: this.forward.size,
      totalRelations,
      filesWithIncoming: this.reverse.size,
    };
  }

  private rebuildReverse(): void {
    this.reverse.clear();
    for (const [source, relations] of this.forward) {
      for (const relation of relations) {
        const incoming = this.reverse.get(relation.target) ?? [];
        incoming.push({ source, description: relation.description });
        this.reverse.set(relation.target, incoming);
      }
    }
  }
}
