/**
 * Core types for the privative feature grammar
 */

import { z } from 'zod';

// =============================================================================
// Feature Catalogue
// =============================================================================

/**
 * The closed catalogue of privative features. Array order is the canonical
 * order used for every sorted output (traces, tables, inventory bundles).
 */
export const FEATURES = [
  'Anterior',
  'Approximant',
  'Back',
  'Consonantal',
  'ConstrictedGlottis',
  'Continuant',
  'Coronal',
  'DelayedRelease',
  'Dorsal',
  'High',
  'Labial',
  'Lateral',
  'Low',
  'Nasal',
  'Round',
  'Sonorant',
  'SpreadGlottis',
  'Strident',
  'Syllabic',
  'Voice',
] as const;

export const FeatureSchema = z.enum(FEATURES);

export type Feature = z.infer<typeof FeatureSchema>;

/** A segment as a set of features. Empty is allowed. */
export type SegmentFeatureSet = ReadonlySet<Feature>;

const FEATURE_INDEX: ReadonlyMap<Feature, number> = new Map(
  FEATURES.map((feature, index) => [feature, index] as const)
);

export function isFeature(name: string): name is Feature {
  return FeatureSchema.safeParse(name).success;
}

export function featureIndex(feature: Feature): number {
  return FEATURE_INDEX.get(feature) ?? -1;
}

export function compareFeatures(a: Feature, b: Feature): number {
  return featureIndex(a) - featureIndex(b);
}

export function sortFeatures(features: Iterable<Feature>): Feature[] {
  return [...features].sort(compareFeatures);
}

export function featureSet(...features: Feature[]): SegmentFeatureSet {
  return new Set(features);
}

/** Canonical key of a feature set, stable under insertion order. */
export function segmentKey(segment: SegmentFeatureSet): string {
  return sortFeatures(segment).join('+');
}

// =============================================================================
// Constraints
// =============================================================================

export type ConstraintKind = 'attract' | 'reject';

export interface ConstraintEdge {
  kind: ConstraintKind;
  from: Feature;
  to: Feature;
}

export function compareEdges(a: ConstraintEdge, b: ConstraintEdge): number {
  if (a.kind !== b.kind) return a.kind === 'attract' ? -1 : 1;
  return compareFeatures(a.from, b.from) || compareFeatures(a.to, b.to);
}

// =============================================================================
// Grammar Views
// =============================================================================

export interface GrammarRow {
  feature: Feature;
  attracts: Feature[];
  rejects: Feature[];
}

/**
 * Record of one learning step. Every list is in catalogue order.
 */
export interface LearnTrace {
  segment: Feature[];
  newFeatures: Feature[];
  attractsAdded: ConstraintEdge[];
  attractsRemoved: ConstraintEdge[];
  rejectsAdded: ConstraintEdge[];
  rejectsRemoved: ConstraintEdge[];
}

export function emptyTrace(): LearnTrace {
  return {
    segment: [],
    newFeatures: [],
    attractsAdded: [],
    attractsRemoved: [],
    rejectsAdded: [],
    rejectsRemoved: [],
  };
}

export function traceIsEmpty(trace: LearnTrace): boolean {
  return (
    trace.newFeatures.length === 0 &&
    trace.attractsAdded.length === 0 &&
    trace.attractsRemoved.length === 0 &&
    trace.rejectsAdded.length === 0 &&
    trace.rejectsRemoved.length === 0
  );
}

// =============================================================================
// Inventory
// =============================================================================

export type Violation = ConstraintEdge;

export interface InventoryEntry {
  /** Resolved identifier, or null when no segment carries the bundle */
  identifier: string | null;
  featureNames: Feature[];
  isEmpty: boolean;
}

export interface SegmentCheck {
  identifier: string;
  featureNames: Feature[];
  valid: boolean;
  violations: Violation[];
}

export interface WordCheck {
  valid: boolean;
  details: SegmentCheck[];
}

export const InventoryStrategySchema = z.enum(['pruned', 'exhaustive']);

export type InventoryStrategy = z.infer<typeof InventoryStrategySchema>;
