import { CorrelationIndex } from './correlation.js';
import { MetricsEngine } from './metrics.js';
import type { ProcessTrustPolicy, Snapshot } from './types.js';

/** A snapshot together with everything derived from it. */
export interface Workspace {
  readonly snapshot: Snapshot;
  readonly index: CorrelationIndex;
  readonly metrics: MetricsEngine;
}

export function createWorkspace(snapshot: Snapshot, policy: ProcessTrustPolicy = 'first-connection'): Workspace {
  const index = new CorrelationIndex(snapshot);
  const metrics = new MetricsEngine(index, policy);
  return Object.freeze({ snapshot, index, metrics });
}
