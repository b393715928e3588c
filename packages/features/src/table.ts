/**
 * Segment table - the curated segment/feature database
 *
 * Loaded once at startup. Any feature name outside the catalogue is a fatal
 * configuration error.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  InvalidConfigError,
  InvalidFeatureNameError,
  isFeature,
  type Feature,
} from '@privative/core';

export const SegmentEntrySchema = z.object({
  symbol: z.string().min(1),
  features: z.array(z.string()),
});

export const DiacriticEntrySchema = z.object({
  mark: z.string().min(1),
  name: z.string(),
  features: z.array(z.string()).min(1),
});

export const SegmentTableSchema = z.object({
  segments: z.array(SegmentEntrySchema),
  diacritics: z.array(DiacriticEntrySchema).default([]),
});

export type RawSegmentTable = z.input<typeof SegmentTableSchema>;

export interface BaseSegment {
  symbol: string;
  features: ReadonlySet<Feature>;
}

export interface Diacritic {
  mark: string;
  name: string;
  features: ReadonlySet<Feature>;
}

export interface SegmentTable {
  segments: BaseSegment[];
  diacritics: Diacritic[];
}

export const DEFAULT_TABLE_URL = new URL('../data/segments.json', import.meta.url);

function toFeatures(names: string[], where: string): ReadonlySet<Feature> {
  const features = new Set<Feature>();
  for (const name of names) {
    if (!isFeature(name)) {
      throw new InvalidFeatureNameError(name, where);
    }
    features.add(name);
  }
  return features;
}

/**
 * Validate a raw table. Symbols and marks are NFD-normalized so that
 * precomposed input matches base + combining mark.
 */
export function loadSegmentTable(raw: unknown): SegmentTable {
  const parsed = SegmentTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    segments: parsed.data.segments.map(entry => ({
      symbol: entry.symbol.normalize('NFD'),
      features: toFeatures(entry.features, `segment "${entry.symbol}"`),
    })),
    diacritics: parsed.data.diacritics.map(entry => ({
      mark: entry.mark.normalize('NFD'),
      name: entry.name,
      features: toFeatures(entry.features, `diacritic "${entry.name}"`),
    })),
  };
}

export function readSegmentTable(path: string | URL = DEFAULT_TABLE_URL): SegmentTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return loadSegmentTable(raw);
}
