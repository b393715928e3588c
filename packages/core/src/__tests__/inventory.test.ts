import { describe, it, expect, vi } from 'vitest';
import { GrammarStore } from '../grammar-store.js';
import { Learner } from '../learner.js';
import { InventoryGenerator } from '../inventory.js';
import { createContext } from '../context.js';
import { InventoryTooLargeError, UnknownSegmentError } from '../errors.js';
import { FEATURES, segmentKey, type Feature, type SegmentFeatureSet } from '../types.js';
import type { FeatureProvider } from '../provider.js';

const SEGMENTS: Record<string, Feature[]> = {
  t: ['Anterior', 'Consonantal', 'Coronal'],
  p: ['Anterior', 'Consonantal', 'Labial'],
  s: ['Anterior', 'Consonantal', 'Continuant', 'Coronal', 'Strident'],
  m: ['Labial', 'Nasal'],
};

function tableProvider(): FeatureProvider {
  return {
    featuresOf(identifier: string): SegmentFeatureSet {
      const features = SEGMENTS[identifier];
      if (!features) throw new UnknownSegmentError(identifier);
      return new Set(features);
    },
    segmentWord: (word: string) => [...word],
    identifierOf(features: ReadonlySet<Feature>): string[] {
      const key = segmentKey(features);
      return Object.keys(SEGMENTS).filter(id => segmentKey(new Set(SEGMENTS[id])) === key);
    },
  };
}

function learned(provider: FeatureProvider = tableProvider()) {
  const store = new GrammarStore();
  const learner = new Learner(store);
  learner.learn(SEGMENTS.s);
  learner.learn(SEGMENTS.p);
  return { store, learner, provider, inventory: new InventoryGenerator(store, provider) };
}

describe('InventoryGenerator.validSegment', () => {
  it('accepts the empty bundle and bundles of unconstrained features', () => {
    const { inventory } = learned();
    expect(inventory.validSegment([])).toBe(true);
    expect(inventory.validSegment(['Coronal', 'Strident'])).toBe(true);
  });

  it('ignores features the grammar has never seen', () => {
    const { inventory } = learned();
    expect(inventory.validSegment(['Anterior', 'Consonantal', 'Labial', 'Nasal'])).toBe(true);
  });

  it('matches the attract/reject formula on every subset', () => {
    const { store, learner, inventory } = learned();
    learner.learn(['Syllabic', 'Voice']);
    learner.learn(['Syllabic', 'Low', 'Voice']);
    learner.learn(['Consonantal', 'Voice']);

    const known = store.knownFeatures();
    for (let mask = 0; mask < 2 ** known.length; mask++) {
      const bundle = new Set(known.filter((_, i) => (mask & (1 << i)) !== 0));
      const expected = [...bundle].every(
        f =>
          store.attractsOf(f).every(g => bundle.has(g)) &&
          store.rejectsOf(f).every(g => !bundle.has(g))
      );
      expect(inventory.validSegment(bundle)).toBe(expected);
    }
  });
});

describe('InventoryGenerator.validBundles', () => {
  it('orders bundles by bitmask over the known features', () => {
    const { inventory } = learned();
    const bundles = inventory.validBundles();
    // 32 bundles without Labial, 8 with Labial plus both of its targets
    expect(bundles).toHaveLength(40);
    expect(bundles[0]).toEqual([]);
    expect(bundles[1]).toEqual(['Anterior']);
    expect(bundles[15]).toEqual(['Anterior', 'Consonantal', 'Continuant', 'Coronal']);
    expect(bundles[16]).toEqual(['Anterior', 'Consonantal', 'Labial']);
  });

  it('gives the same answer pruned and exhaustive', () => {
    const { learner, inventory } = learned();
    learner.learn(['Syllabic', 'Voice']);
    learner.learn(['Syllabic', 'Low', 'Voice']);
    learner.learn(['Consonantal']);
    learner.learn(['Consonantal', 'Voice']);
    learner.learn(['Nasal', 'Voice', 'Consonantal', 'Labial']);

    const pruned = inventory.validBundles('pruned');
    expect(pruned).toEqual(inventory.validBundles('exhaustive'));
    for (const bundle of pruned) {
      expect(inventory.validSegment(bundle)).toBe(true);
    }
  });

  it('refuses to enumerate past the configured feature limit', () => {
    const store = new GrammarStore();
    new Learner(store).learn(SEGMENTS.s);
    const inventory = new InventoryGenerator(
      store,
      tableProvider(),
      createContext({ maxEnumerationFeatures: 3 })
    );
    expect(() => inventory.validBundles()).toThrow(InventoryTooLargeError);
  });

  it('warns before an exhaustive enumeration over many features', () => {
    const store = new GrammarStore();
    new Learner(store).learn(FEATURES.slice(0, 16));
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const inventory = new InventoryGenerator(store, tableProvider(), createContext({ logger }));

    inventory.validBundles('pruned');
    expect(logger.warn).not.toHaveBeenCalled();

    expect(inventory.validBundles('exhaustive')).toHaveLength(65536);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      '[InventoryGenerator] exhaustive enumeration over 16 features (65536 candidates)'
    );
  });

  it('returns only the empty bundle for an empty grammar', () => {
    const inventory = new InventoryGenerator(new GrammarStore(), tableProvider());
    expect(inventory.validBundles()).toEqual([[]]);
  });
});

describe('InventoryGenerator.predictedInventory', () => {
  it('resolves bundles to identifiers and marks unresolved ones empty', () => {
    const { inventory } = learned();
    const entries = inventory.predictedInventory(true);
    expect(entries).toHaveLength(40);
    expect(entries[0]).toEqual({ identifier: null, featureNames: [], isEmpty: true });
    expect(entries.filter(e => !e.isEmpty).map(e => e.identifier)).toEqual(['t', 'p', 's']);
  });

  it('asks the provider for diacritic variants only when not basic', () => {
    const provider = tableProvider();
    const identifierOf = vi.spyOn(provider, 'identifierOf');
    const { inventory } = learned(provider);

    inventory.predictedInventory(true);
    expect(identifierOf.mock.calls.every(([, allow]) => allow === false)).toBe(true);

    identifierOf.mockClear();
    inventory.predictedInventory(false);
    expect(identifierOf.mock.calls.every(([, allow]) => allow === true)).toBe(true);
  });

  it('lists every identifier a bundle resolves to', () => {
    const provider = tableProvider();
    vi.spyOn(provider, 'identifierOf').mockImplementation((features, allow) =>
      allow && features.size === 1 && features.has('Anterior') ? ['a1', 'a2'] : []
    );
    const { inventory } = learned(provider);
    const anterior = inventory
      .predictedInventory(false)
      .filter(e => e.featureNames.length === 1 && e.featureNames[0] === 'Anterior');
    expect(anterior).toEqual([
      { identifier: 'a1', featureNames: ['Anterior'], isEmpty: false },
      { identifier: 'a2', featureNames: ['Anterior'], isEmpty: false },
    ]);
  });
});

describe('InventoryGenerator.checkWord', () => {
  it('ANDs per-segment validity and keeps the detail', () => {
    const { inventory } = learned();
    const result = inventory.checkWord('tm');
    expect(result.valid).toBe(false);
    expect(result.details).toEqual([
      {
        identifier: 't',
        featureNames: ['Anterior', 'Consonantal', 'Coronal'],
        valid: true,
        violations: [],
      },
      {
        identifier: 'm',
        featureNames: ['Labial', 'Nasal'],
        valid: false,
        violations: [
          { kind: 'attract', from: 'Labial', to: 'Anterior' },
          { kind: 'attract', from: 'Labial', to: 'Consonantal' },
        ],
      },
    ]);
  });

  it('is vacuously valid for an empty word', () => {
    const { inventory } = learned();
    expect(inventory.checkWord('')).toEqual({ valid: true, details: [] });
  });

  it('surfaces unknown segments', () => {
    const { inventory } = learned();
    expect(() => inventory.checkWord('tx')).toThrow(UnknownSegmentError);
  });
});
