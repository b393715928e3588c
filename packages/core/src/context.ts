/**
 * Engine context
 *
 * Carries logging configuration through the learner and the inventory
 * generator.
 */

export type GrammarLogger = Pick<Console, 'debug' | 'warn'>;

export interface EngineContext {
  /** Emit one debug line per operation */
  trace: boolean;
  logger: GrammarLogger;
  /** Largest known-feature count the inventory enumeration accepts */
  maxEnumerationFeatures: number;
}

export function createContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    trace: false,
    logger: console,
    maxEnumerationFeatures: 20,
    ...overrides,
  };
}

export function debug(context: EngineContext, tag: string, message: string): void {
  if (context.trace) {
    context.logger.debug(`[${tag}] ${message}`);
  }
}
