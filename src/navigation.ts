import type { FilterEngine } from './filters.js';
import { describeConnection } from './rows.js';
import type { ConnectionRecord } from './types.js';
import type { Workspace } from './workspace.js';
import type { NavigationState, ViewEmphasis, ViewName } from '../shared/types.js';

export type NavigationEvent =
  | { type: 'ProcessSelected'; pid: number }
  | { type: 'ConnectionSelected'; connection: ConnectionRecord }
  | { type: 'FilterByProcess'; name: string }
  | { type: 'FilterByUser'; username: string }
  | { type: 'HighlightExternal' }
  | { type: 'HighlightUntrusted' };

export type NavigationEventType = NavigationEvent['type'];

export type NavigationHandler<E extends NavigationEvent = NavigationEvent> = (event: E) => void;

type EventOf<T extends NavigationEventType> = Extract<NavigationEvent, { type: T }>;

// Handlers set state; they are not expected to publish. A few levels of
// nesting are tolerated, anything deeper is a loop.
export const MAX_PUBLISH_DEPTH = 4;

export class NavigationLoopError extends Error {
  constructor(readonly event: NavigationEvent, readonly depth: number) {
    super(`Navigation event ${event.type} re-published ${depth} levels deep`);
    this.name = 'NavigationLoopError';
  }
}

/**
 * Synchronous publish/subscribe over the closed set of navigation events.
 * `publish` returns only after every handler has run.
 */
export class NavigationBus {
  private readonly handlers: Set<NavigationHandler> = new Set();
  private depth = 0;

  subscribe(handler: NavigationHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  on<T extends NavigationEventType>(type: T, handler: NavigationHandler<EventOf<T>>): () => void {
    return this.subscribe(event => {
      if (isEventOf(event, type)) handler(event);
    });
  }

  publish(event: NavigationEvent): void {
    if (this.depth >= MAX_PUBLISH_DEPTH) {
      throw new NavigationLoopError(event, this.depth);
    }

    const failures: unknown[] = [];
    this.depth++;
    try {
      // Snapshot the set so handlers may unsubscribe while being called.
      for (const handler of [...this.handlers]) {
        try {
          handler(event);
        } catch (error) {
          if (error instanceof NavigationLoopError) throw error;
          failures.push(error);
        }
      }
    } finally {
      this.depth--;
    }

    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} handlers failed on ${event.type}`);
    }
  }

  get handlerCount(): number {
    return this.handlers.size;
  }
}

function isEventOf<T extends NavigationEventType>(event: NavigationEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

type StateListener = (state: Readonly<NavigationState>) => void;

export const INITIAL_NAVIGATION_STATE: Readonly<NavigationState> = Object.freeze({
  selectedPid: null,
  focusedConnection: null,
  requestedView: null,
  emphasis: null,
});

/**
 * Applies navigation events to filter state and to the "requested view".
 * One controller is shared by every view of a session.
 */
export class NavigationController {
  private state: Readonly<NavigationState> = INITIAL_NAVIGATION_STATE;
  private readonly listeners: Set<StateListener> = new Set();
  private readonly detach: () => void;

  constructor(
    private readonly bus: NavigationBus,
    private readonly filters: FilterEngine,
    private readonly workspace: () => Workspace
  ) {
    this.detach = bus.subscribe(event => this.handle(event));
  }

  getState(): Readonly<NavigationState> {
    return this.state;
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Follows the focused connection to its owning process in the tree view. */
  openOwner(): boolean {
    const focused = this.state.focusedConnection;
    if (!focused?.owner) return false;
    this.bus.publish({ type: 'ProcessSelected', pid: focused.owner.Pid });
    this.requestView('tree', null);
    return true;
  }

  /** Marks a view active without an event, e.g. after a tab click. */
  requestView(view: ViewName, emphasis: ViewEmphasis | null = null): void {
    this.setState({ requestedView: view, emphasis });
  }

  /** Drops selection that may not exist in a freshly loaded snapshot. */
  reset(): void {
    this.setState(INITIAL_NAVIGATION_STATE);
  }

  dispose(): void {
    this.detach();
    this.listeners.clear();
  }

  private handle(event: NavigationEvent): void {
    switch (event.type) {
      case 'ProcessSelected':
        this.setState({ selectedPid: event.pid });
        break;
      case 'ConnectionSelected':
        this.setState({ focusedConnection: describeConnection(this.workspace(), event.connection) });
        break;
      case 'FilterByProcess':
        this.filters.update('grid', { search: event.name });
        this.setState({ requestedView: 'grid', emphasis: null });
        break;
      case 'FilterByUser':
        this.filters.update('table', { username: event.username });
        this.setState({ requestedView: 'table', emphasis: null });
        break;
      case 'HighlightExternal':
        this.setState({ requestedView: 'security', emphasis: 'external' });
        break;
      case 'HighlightUntrusted':
        this.setState({ requestedView: 'security', emphasis: 'untrusted' });
        break;
    }
  }

  private setState(patch: Partial<NavigationState>) {
    this.state = Object.freeze({ ...this.state, ...patch });
    const current = this.state;
    this.listeners.forEach(listener => listener(current));
  }
}
