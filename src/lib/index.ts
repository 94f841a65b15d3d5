/**
 * relayloop library
 *
 * Organized into logical modules:
 * - core: runtime config, logging, async plumbing
 * - providers: canonical events, error taxonomy, stream adapters
 * - routing: provider profiles, credential indirection, ProviderRouter
 * - agent: AgentLoop, retry policy, tool call tracking
 * - metrics: non-blocking metrics emitter
 */

export * from './core/index.js';
export * from './providers/index.js';
export * from './routing/index.js';
export * from './agent/index.js';
export * from './metrics/index.js';
