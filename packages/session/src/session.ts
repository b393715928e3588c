/**
 * GrammarSession - the in-process call surface
 *
 * Sequences word → segment → feature extraction through a FeatureProvider
 * and drives one privately owned grammar. Sessions never share state.
 *
 * Atomicity is per segment: features are resolved before the grammar is
 * touched, so a failed lookup leaves the grammar as it was, and a failure
 * partway through a word keeps whatever the earlier segments taught.
 */

import {
  GrammarStore,
  InventoryGenerator,
  Learner,
  createContext,
  debug,
  emptyTrace,
  sortFeatures,
  type ConstraintEdge,
  type EngineContext,
  type FeatureProvider,
  type GrammarRow,
  type InventoryEntry,
  type LearnTrace,
  type SegmentCheck,
  type WordCheck,
} from '@privative/core';
import { createDefaultProvider } from '@privative/features';
import { resolveConfig, type SessionConfig, type SessionOptions } from './config.js';

export interface SessionStats {
  segmentsLearned: number;
  knownFeatures: number;
  attractCount: number;
  rejectCount: number;
}

export class GrammarSession {
  private config: SessionConfig;
  private context: EngineContext;
  private provider: FeatureProvider;
  private store: GrammarStore;
  private learner: Learner;
  private inventory: InventoryGenerator;
  private committed: LearnTrace[] = [];

  constructor(provider: FeatureProvider, options: SessionOptions = {}) {
    this.config = resolveConfig(options);
    this.context = createContext({
      trace: this.config.trace,
      maxEnumerationFeatures: this.config.maxEnumerationFeatures,
      ...(options.logger ? { logger: options.logger } : {}),
    });
    this.provider = provider;
    this.store = new GrammarStore();
    this.learner = new Learner(this.store, this.context);
    this.inventory = new InventoryGenerator(
      this.store,
      provider,
      this.context,
      this.config.inventoryStrategy
    );
  }

  // ===========================================================================
  // Learning
  // ===========================================================================

  learnSegment(identifier: string): LearnTrace {
    if (identifier.trim().length === 0) return emptyTrace();

    const features = this.provider.featuresOf(identifier);
    if (features.size === 0) return emptyTrace();

    const trace = this.learner.learn(features);
    this.committed.push(trace);
    return trace;
  }

  learnWord(word: string): LearnTrace[] {
    const segments = this.provider.segmentWord(word);
    const traces: LearnTrace[] = [];

    for (const [index, identifier] of segments.entries()) {
      try {
        traces.push(this.learnSegment(identifier));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        debug(
          this.context,
          'GrammarSession',
          `learnWord "${word}" stopped at segment ${index} (${identifier}): ${reason}; ${index} segment(s) kept`
        );
        throw error;
      }
    }

    return traces;
  }

  // ===========================================================================
  // Validation and Inventory
  // ===========================================================================

  validSegment(identifier: string): boolean {
    if (identifier.trim().length === 0) return true;
    return this.inventory.validSegment(this.provider.featuresOf(identifier));
  }

  /** Per-constraint detail for one segment */
  explain(identifier: string): SegmentCheck {
    const features = this.provider.featuresOf(identifier);
    const violations = this.inventory.violations(features);
    return {
      identifier,
      featureNames: sortFeatures(features),
      valid: violations.length === 0,
      violations,
    };
  }

  checkWord(word: string): WordCheck {
    return this.inventory.checkWord(word);
  }

  predictedInventory(basicOnly: boolean = true): InventoryEntry[] {
    return this.inventory.predictedInventory(basicOnly);
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  grammarTable(): GrammarRow[] {
    return this.store.grammarTable();
  }

  constraints(): ConstraintEdge[] {
    return this.store.constraints();
  }

  /** The trace of every non-empty segment learned since the last reset, repeats included */
  traces(): LearnTrace[] {
    return [...this.committed];
  }

  stats(): SessionStats {
    const edges = this.store.constraints();
    return {
      segmentsLearned: this.committed.length,
      knownFeatures: this.store.size,
      attractCount: edges.filter(e => e.kind === 'attract').length,
      rejectCount: edges.filter(e => e.kind === 'reject').length,
    };
  }

  reset(): void {
    this.store.reset();
    this.committed = [];
    debug(this.context, 'GrammarSession', 'reset');
  }
}

export function createSession(options: SessionOptions = {}): GrammarSession {
  return new GrammarSession(options.provider ?? createDefaultProvider(), options);
}
