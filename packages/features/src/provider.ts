/**
 * SegmentTableProvider - FeatureProvider backed by a segment table
 *
 * Identifiers are a base symbol optionally followed by diacritic marks; the
 * features of a marked identifier are the union of base and mark features.
 */

import {
  UnknownSegmentError,
  segmentKey,
  type Feature,
  type FeatureProvider,
  type SegmentFeatureSet,
} from '@privative/core';
import { readSegmentTable, type BaseSegment, type Diacritic, type SegmentTable } from './table.js';

export class SegmentTableProvider implements FeatureProvider {
  private segments: BaseSegment[];
  private diacritics: Map<string, Diacritic>;
  private bySymbol: Map<string, BaseSegment>;
  /** Base symbols, longest first, for greedy matching */
  private symbolsByLength: string[];

  constructor(table: SegmentTable) {
    this.segments = table.segments;
    this.diacritics = new Map(table.diacritics.map(d => [d.mark, d] as const));
    this.bySymbol = new Map(table.segments.map(s => [s.symbol, s] as const));
    this.symbolsByLength = [...this.bySymbol.keys()].sort((a, b) => b.length - a.length);
  }

  static fromFile(path?: string | URL): SegmentTableProvider {
    return new SegmentTableProvider(readSegmentTable(path));
  }

  featuresOf(identifier: string): SegmentFeatureSet {
    const normalized = identifier.normalize('NFD');
    if (normalized.length === 0) return new Set();

    const exact = this.bySymbol.get(normalized);
    if (exact) return new Set(exact.features);

    for (const symbol of this.symbolsByLength) {
      if (!normalized.startsWith(symbol)) continue;
      const marks = this.readMarks(normalized.slice(symbol.length));
      if (!marks) continue;

      const features = new Set(this.bySymbol.get(symbol)?.features);
      for (const mark of marks) {
        for (const feature of mark.features) features.add(feature);
      }
      return features;
    }

    throw new UnknownSegmentError(identifier);
  }

  /**
   * Greedy longest-match segmentation. A character that starts no known
   * symbol becomes a segment of its own and fails later, in featuresOf.
   */
  segmentWord(word: string): string[] {
    const text = word.normalize('NFD').replace(/\s+/g, '');
    const out: string[] = [];
    let i = 0;

    while (i < text.length) {
      let segment = this.symbolsByLength.find(symbol => text.startsWith(symbol, i));
      if (segment === undefined) {
        segment = String.fromCodePoint(text.codePointAt(i) ?? 0);
      }
      i += segment.length;

      while (i < text.length && this.diacritics.has(text[i])) {
        segment += text[i];
        i += 1;
      }
      out.push(segment);
    }

    return out;
  }

  /**
   * Exact base matches first, in table order. With diacritics allowed, each
   * base is then extended by marks taken in table order, every mark used at
   * most once and adding at least one feature.
   */
  identifierOf(features: ReadonlySet<Feature>, allowDiacritics: boolean): string[] {
    const key = segmentKey(features);
    const out = this.segments.filter(s => segmentKey(s.features) === key).map(s => s.symbol);
    if (!allowDiacritics) return out;

    const marks = [...this.diacritics.values()];
    for (const base of this.segments) {
      if (!isSubset(base.features, features) || base.features.size === features.size) continue;
      this.extend(base.symbol, base.features, 0, marks, features, out);
    }
    return out;
  }

  private extend(
    prefix: string,
    carried: ReadonlySet<Feature>,
    from: number,
    marks: Diacritic[],
    bundle: ReadonlySet<Feature>,
    out: string[]
  ): void {
    for (let i = from; i < marks.length; i++) {
      const mark = marks[i];
      if (!isSubset(mark.features, bundle)) continue;
      if (isSubset(mark.features, carried)) continue;

      const next = new Set([...carried, ...mark.features]);
      if (next.size === bundle.size) {
        out.push(prefix + mark.mark);
      } else {
        this.extend(prefix + mark.mark, next, i + 1, marks, bundle, out);
      }
    }
  }

  private readMarks(rest: string): Diacritic[] | null {
    const marks: Diacritic[] = [];
    for (const char of rest) {
      const mark = this.diacritics.get(char);
      if (!mark) return null;
      marks.push(mark);
    }
    return marks;
  }
}

function isSubset(a: ReadonlySet<Feature>, b: ReadonlySet<Feature>): boolean {
  for (const feature of a) {
    if (!b.has(feature)) return false;
  }
  return true;
}

export function createDefaultProvider(): SegmentTableProvider {
  return SegmentTableProvider.fromFile();
}
