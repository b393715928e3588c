/**
 * FeatureProvider - the boundary to segment/feature resolution
 *
 * The engine only ever sees feature sets. Whatever database maps identifiers
 * to features lives behind this interface.
 */

import type { Feature, SegmentFeatureSet } from './types.js';

export interface FeatureProvider {
  /** Features of one segment. Throws UnknownSegmentError if unresolvable. */
  featuresOf(identifier: string): SegmentFeatureSet;
  /** Split a word into segment identifiers, in order */
  segmentWord(word: string): string[];
  /** Every identifier whose features equal the bundle; diacritic variants when allowed */
  identifierOf(features: ReadonlySet<Feature>, allowDiacritics: boolean): string[];
}
