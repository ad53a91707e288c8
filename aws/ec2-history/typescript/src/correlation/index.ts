/**
 * Correlation
 */

export type { CorrelationState, LaunchEntry, TerminationEntry } from './types.js';
export type { ResolvedLifecycles } from './correlator.js';
export { LifecycleCorrelator, resolveLifecycles } from './correlator.js';
