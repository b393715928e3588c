/**
 * @privative/features - Table-backed segment/feature resolution
 *
 * Implements the FeatureProvider boundary of @privative/core over a curated
 * segment table with diacritic marks.
 */

export {
  loadSegmentTable,
  readSegmentTable,
  SegmentTableSchema,
  SegmentEntrySchema,
  DiacriticEntrySchema,
  DEFAULT_TABLE_URL,
  type RawSegmentTable,
  type SegmentTable,
  type BaseSegment,
  type Diacritic,
} from './table.js';

export { SegmentTableProvider, createDefaultProvider } from './provider.js';
