/**
 * @privative/session - Learning sessions over a feature provider
 */

export { GrammarSession, createSession, type SessionStats } from './session.js';
export {
  SessionConfigSchema,
  resolveConfig,
  type SessionConfig,
  type SessionOptions,
} from './config.js';
