/**
 * @privative/core - Feature-interaction grammar engine
 *
 * Three parts:
 * - GrammarStore: per-feature attract/reject sets and observation history
 * - Learner: the per-segment update (prune, acquire, record, reject)
 * - InventoryGenerator: validation and inventory prediction
 */

export * from './types.js';
export * from './errors.js';
export * from './context.js';
export * from './provider.js';
export * from './grammar-store.js';
export * from './learner.js';
export * from './inventory.js';
