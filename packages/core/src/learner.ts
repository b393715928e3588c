/**
 * Learner - per-segment constraint update
 *
 * Each observed segment runs five steps against the grammar state:
 *
 *   partition → prune attracts → acquire features → record history → recompute rejects
 *
 * Partitioning sees the state from before the call. Rejects are a pure
 * function of accumulated history, recomputed in full every call.
 */

import { GrammarStore } from './grammar-store.js';
import { createContext, debug, type EngineContext } from './context.js';
import {
  compareEdges,
  emptyTrace,
  sortFeatures,
  type Feature,
  type LearnTrace,
  type SegmentFeatureSet,
} from './types.js';

/** Minimum distinct segments a feature needs before it can reject anything */
export const REJECT_EVIDENCE_THRESHOLD = 2;

export class Learner {
  private store: GrammarStore;
  private context: EngineContext;

  constructor(store: GrammarStore, context: EngineContext = createContext()) {
    this.store = store;
    this.context = context;
  }

  learn(segment: Iterable<Feature>): LearnTrace {
    const features = sortFeatures(new Set(segment));
    if (features.length === 0) {
      debug(this.context, 'Learner', 'empty segment, nothing to learn');
      return emptyTrace();
    }

    const observed: SegmentFeatureSet = new Set(features);
    const newFeatures = features.filter(f => !this.store.has(f));
    const knownFeatures = features.filter(f => this.store.has(f));
    const trace: LearnTrace = { ...emptyTrace(), segment: features, newFeatures };

    // Counter-evidence: F was seen without G
    for (const from of knownFeatures) {
      for (const to of this.store.attractsOf(from)) {
        if (!observed.has(to) && this.store.clearAttract(from, to)) {
          trace.attractsRemoved.push({ kind: 'attract', from, to });
        }
      }
    }

    for (const feature of newFeatures) {
      this.store.addFeature(feature);
    }
    for (const from of newFeatures) {
      for (const to of knownFeatures) {
        if (this.store.setAttract(from, to)) {
          trace.attractsAdded.push({ kind: 'attract', from, to });
        }
      }
    }

    for (const feature of features) {
      this.store.recordObservation(feature, observed);
    }

    this.recomputeRejects(trace);

    trace.attractsAdded.sort(compareEdges);
    trace.attractsRemoved.sort(compareEdges);
    trace.rejectsAdded.sort(compareEdges);
    trace.rejectsRemoved.sort(compareEdges);

    debug(
      this.context,
      'Learner',
      `{${features.join(', ')}}: new=${newFeatures.length} ` +
        `+attract=${trace.attractsAdded.length} -attract=${trace.attractsRemoved.length} ` +
        `+reject=${trace.rejectsAdded.length} -reject=${trace.rejectsRemoved.length}`
    );

    return trace;
  }

  private recomputeRejects(trace: LearnTrace): void {
    const known = this.store.knownFeatures();

    for (const from of known) {
      const segments = this.store.distinctSegmentsOf(from);
      if (segments.length < REJECT_EVIDENCE_THRESHOLD) continue;

      for (const to of known) {
        if (to === from) continue;
        const coOccurs = segments.some(segment => segment.has(to));
        if (coOccurs) {
          if (this.store.clearReject(from, to)) {
            trace.rejectsRemoved.push({ kind: 'reject', from, to });
          }
          continue;
        }
        if (this.store.setReject(from, to)) {
          trace.rejectsAdded.push({ kind: 'reject', from, to });
        }
      }
    }
  }
}
