import { FilterEngine } from './filters.js';
import { NavigationBus, NavigationController } from './navigation.js';
import { emptySnapshot, loadSnapshot } from './snapshot.js';
import type { ProcessTrustPolicy } from './types.js';
import { createWorkspace, type Workspace } from './workspace.js';

type Subscriber = (workspace: Workspace) => void;

export interface SessionOptions {
  trustPolicy?: ProcessTrustPolicy;
}

/**
 * Current workspace plus the per-view filter state and navigation wiring
 * shared by every consumer. `load` builds the next workspace completely
 * before swapping it in, so readers see either the old snapshot or the new
 * one, never a mix.
 */
export class AnalysisSession {
  readonly filters = new FilterEngine();
  readonly bus = new NavigationBus();
  readonly navigation: NavigationController;
  readonly trustPolicy: ProcessTrustPolicy;

  private current: Workspace;
  private subscribers: Set<Subscriber> = new Set();

  constructor(options: SessionOptions = {}) {
    this.trustPolicy = options.trustPolicy ?? 'first-connection';
    this.current = createWorkspace(emptySnapshot(), this.trustPolicy);
    this.navigation = new NavigationController(this.bus, this.filters, () => this.current);
  }

  get workspace(): Workspace {
    return this.current;
  }

  load(processRecords: readonly unknown[], connectionRecords: readonly unknown[]): Workspace {
    const next = createWorkspace(loadSnapshot(processRecords, connectionRecords), this.trustPolicy);
    this.current = next;
    this.navigation.reset();
    this.subscribers.forEach(callback => callback(next));
    return next;
  }

  subscribe(callback: Subscriber): () => void {
    this.subscribers.add(callback);
    return () => this.subscribers.delete(callback);
  }

  dispose(): void {
    this.navigation.dispose();
    this.subscribers.clear();
  }
}
