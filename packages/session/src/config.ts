/**
 * Session configuration
 */

import { z } from 'zod';
import {
  FEATURES,
  InvalidConfigError,
  InventoryStrategySchema,
  type FeatureProvider,
  type GrammarLogger,
} from '@privative/core';

export const SessionConfigSchema = z.object({
  /** Log one debug line per learning step */
  trace: z.boolean().default(false),
  /** How predictedInventory enumerates candidate bundles */
  inventoryStrategy: InventoryStrategySchema.default('pruned'),
  /** Refuse to enumerate above this many known features */
  maxEnumerationFeatures: z.number().int().min(1).max(FEATURES.length).default(FEATURES.length),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export interface SessionOptions extends Partial<SessionConfig> {
  /** Defaults to the bundled segment table */
  provider?: FeatureProvider;
  logger?: GrammarLogger;
}

export function resolveConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  const parsed = SessionConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
