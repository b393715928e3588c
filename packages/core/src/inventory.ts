/**
 * InventoryGenerator - validation and inventory prediction
 *
 * A bundle is valid when every feature in it has its attract targets present
 * and none of its reject targets present. The predicted inventory is every
 * valid subset of the known features, resolved back to identifiers.
 *
 * Enumeration is exponential in the number of known features (2^n). The
 * catalogue caps n at 20; a larger catalogue would need the guard raised and
 * a different approach.
 */

import { GrammarStore } from './grammar-store.js';
import { createContext, debug, type EngineContext } from './context.js';
import { InventoryTooLargeError } from './errors.js';
import type { FeatureProvider } from './provider.js';
import {
  compareEdges,
  sortFeatures,
  type Feature,
  type InventoryEntry,
  type InventoryStrategy,
  type SegmentCheck,
  type Violation,
  type WordCheck,
} from './types.js';

/** Known-feature count above which exhaustive enumeration logs a warning */
const EXHAUSTIVE_WARN_AT = 16;

export class InventoryGenerator {
  private store: GrammarStore;
  private provider: FeatureProvider;
  private context: EngineContext;
  private strategy: InventoryStrategy;

  constructor(
    store: GrammarStore,
    provider: FeatureProvider,
    context: EngineContext = createContext(),
    strategy: InventoryStrategy = 'pruned'
  ) {
    this.store = store;
    this.provider = provider;
    this.context = context;
    this.strategy = strategy;
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  violations(segment: Iterable<Feature>): Violation[] {
    const bundle = new Set(segment);
    const found: Violation[] = [];

    for (const from of bundle) {
      for (const to of this.store.attractsOf(from)) {
        if (!bundle.has(to)) found.push({ kind: 'attract', from, to });
      }
      for (const to of this.store.rejectsOf(from)) {
        if (bundle.has(to)) found.push({ kind: 'reject', from, to });
      }
    }

    return found.sort(compareEdges);
  }

  validSegment(segment: Iterable<Feature>): boolean {
    return this.violations(segment).length === 0;
  }

  checkWord(word: string): WordCheck {
    const details: SegmentCheck[] = this.provider.segmentWord(word).map(identifier => {
      const features = this.provider.featuresOf(identifier);
      const violations = this.violations(features);
      return {
        identifier,
        featureNames: sortFeatures(features),
        valid: violations.length === 0,
        violations,
      };
    });

    return { valid: details.every(d => d.valid), details };
  }

  // ===========================================================================
  // Enumeration
  // ===========================================================================

  /**
   * Every valid subset of the known features, ordered by the bitmask of
   * their positions in `knownFeatures()` (bit i set = i-th feature present).
   */
  validBundles(strategy: InventoryStrategy = this.strategy): Feature[][] {
    const known = this.store.knownFeatures();
    if (known.length > this.context.maxEnumerationFeatures) {
      throw new InventoryTooLargeError(known.length, this.context.maxEnumerationFeatures);
    }
    if (strategy === 'exhaustive' && known.length >= EXHAUSTIVE_WARN_AT) {
      this.context.logger.warn(
        `[InventoryGenerator] exhaustive enumeration over ${known.length} features (${2 ** known.length} candidates)`
      );
    }

    const masks =
      strategy === 'exhaustive' ? this.exhaustiveMasks(known) : this.prunedMasks(known);
    masks.sort((a, b) => a - b);

    debug(
      this.context,
      'InventoryGenerator',
      `${strategy}: ${masks.length} valid of ${2 ** known.length} candidates`
    );

    return masks.map(mask => known.filter((_, i) => (mask & (1 << i)) !== 0));
  }

  predictedInventory(basicOnly: boolean): InventoryEntry[] {
    const entries: InventoryEntry[] = [];

    for (const bundle of this.validBundles()) {
      const identifiers = this.provider.identifierOf(new Set(bundle), !basicOnly);
      if (identifiers.length === 0) {
        entries.push({ identifier: null, featureNames: bundle, isEmpty: true });
        continue;
      }
      for (const identifier of identifiers) {
        entries.push({ identifier, featureNames: bundle, isEmpty: false });
      }
    }

    return entries;
  }

  /** Reference enumeration: test every subset */
  private exhaustiveMasks(known: Feature[]): number[] {
    const masks: number[] = [];
    const total = 2 ** known.length;

    for (let mask = 0; mask < total; mask++) {
      const bundle = known.filter((_, i) => (mask & (1 << i)) !== 0);
      if (this.validSegment(bundle)) masks.push(mask);
    }

    return masks;
  }

  /**
   * Depth-first include/exclude search that abandons a branch once a chosen
   * feature rejects another chosen one or attracts an excluded one.
   */
  private prunedMasks(known: Feature[]): number[] {
    const masks: number[] = [];
    const chosen = new Set<Feature>();
    const excluded = new Set<Feature>();

    const attracts = new Map(known.map(f => [f, this.store.attractsOf(f)] as const));
    const rejects = new Map(known.map(f => [f, this.store.rejectsOf(f)] as const));

    const canInclude = (feature: Feature): boolean => {
      if ((attracts.get(feature) ?? []).some(to => excluded.has(to))) return false;
      if ((rejects.get(feature) ?? []).some(to => chosen.has(to))) return false;
      for (const other of chosen) {
        if ((rejects.get(other) ?? []).includes(feature)) return false;
      }
      return true;
    };

    const canExclude = (feature: Feature): boolean => {
      for (const other of chosen) {
        if ((attracts.get(other) ?? []).includes(feature)) return false;
      }
      return true;
    };

    const visit = (index: number, mask: number): void => {
      if (index === known.length) {
        if (this.validSegment(chosen)) masks.push(mask);
        return;
      }
      const feature = known[index];

      if (canExclude(feature)) {
        excluded.add(feature);
        visit(index + 1, mask);
        excluded.delete(feature);
      }
      if (canInclude(feature)) {
        chosen.add(feature);
        visit(index + 1, mask | (1 << index));
        chosen.delete(feature);
      }
    };

    visit(0, 0);
    return masks;
  }
}
