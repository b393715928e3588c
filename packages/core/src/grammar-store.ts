/**
 * GrammarStore - owned grammar state
 *
 * Maps every observed feature to its attract and reject sets and keeps the
 * observation history the reject rule is computed from.
 *
 * Invariants:
 * - a feature is known iff it has been added (observed at least once)
 * - Attract(F,G) and Reject(F,G) are never both set
 * - no feature constrains itself
 */

import {
  compareEdges,
  segmentKey,
  sortFeatures,
  type ConstraintEdge,
  type Feature,
  type GrammarRow,
  type SegmentFeatureSet,
} from './types.js';

interface FeatureEntry {
  attracts: Set<Feature>;
  rejects: Set<Feature>;
  history: SegmentFeatureSet[];
  distinct: Map<string, SegmentFeatureSet>;
}

export class GrammarStore {
  private entries: Map<Feature, FeatureEntry> = new Map();

  get size(): number {
    return this.entries.size;
  }

  has(feature: Feature): boolean {
    return this.entries.has(feature);
  }

  /**
   * Add a feature with empty constraint sets. Returns false if already known.
   */
  addFeature(feature: Feature): boolean {
    if (this.entries.has(feature)) return false;
    this.entries.set(feature, {
      attracts: new Set(),
      rejects: new Set(),
      history: [],
      distinct: new Map(),
    });
    return true;
  }

  setAttract(from: Feature, to: Feature): boolean {
    const entry = this.entries.get(from);
    if (!entry || from === to || entry.attracts.has(to)) return false;
    entry.rejects.delete(to);
    entry.attracts.add(to);
    return true;
  }

  clearAttract(from: Feature, to: Feature): boolean {
    return this.entries.get(from)?.attracts.delete(to) ?? false;
  }

  setReject(from: Feature, to: Feature): boolean {
    const entry = this.entries.get(from);
    if (!entry || from === to || entry.rejects.has(to)) return false;
    entry.attracts.delete(to);
    entry.rejects.add(to);
    return true;
  }

  clearReject(from: Feature, to: Feature): boolean {
    return this.entries.get(from)?.rejects.delete(to) ?? false;
  }

  /**
   * Append a segment to a known feature's history. The segment is copied so
   * later mutation by the caller cannot rewrite history.
   */
  recordObservation(feature: Feature, segment: SegmentFeatureSet): boolean {
    const entry = this.entries.get(feature);
    if (!entry) return false;
    const copy: SegmentFeatureSet = new Set(segment);
    entry.history.push(copy);
    const key = segmentKey(copy);
    if (!entry.distinct.has(key)) entry.distinct.set(key, copy);
    return true;
  }

  attractsOf(feature: Feature): Feature[] {
    return sortFeatures(this.entries.get(feature)?.attracts ?? []);
  }

  rejectsOf(feature: Feature): Feature[] {
    return sortFeatures(this.entries.get(feature)?.rejects ?? []);
  }

  historyOf(feature: Feature): readonly SegmentFeatureSet[] {
    return this.entries.get(feature)?.history ?? [];
  }

  distinctSegmentsOf(feature: Feature): SegmentFeatureSet[] {
    return [...(this.entries.get(feature)?.distinct.values() ?? [])];
  }

  knownFeatures(): Feature[] {
    return sortFeatures(this.entries.keys());
  }

  grammarTable(): GrammarRow[] {
    return this.knownFeatures().map(feature => ({
      feature,
      attracts: this.attractsOf(feature),
      rejects: this.rejectsOf(feature),
    }));
  }

  constraints(): ConstraintEdge[] {
    const edges: ConstraintEdge[] = [];
    for (const [from, entry] of this.entries) {
      for (const to of entry.attracts) edges.push({ kind: 'attract', from, to });
      for (const to of entry.rejects) edges.push({ kind: 'reject', from, to });
    }
    return edges.sort(compareEdges);
  }

  reset(): void {
    this.entries.clear();
  }
}
