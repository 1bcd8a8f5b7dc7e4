import type { ConnectionProtocol, ConnectionRecord, ProcessRecord, Snapshot } from './types.js';
import type { ViewName } from '../shared/types.js';

export const ANY = 'any';

/**
 * Filter predicates for one view. Absent fields, and fields set to 'any',
 * do not constrain the result.
 */
export interface FilterSpec {
  search?: string;
  protocol?: ConnectionProtocol | typeof ANY;
  status?: string;
  username?: string;
}

export interface FilteredConnection {
  index: number;
  connection: ConnectionRecord;
}

export const EMPTY_FILTER: Readonly<FilterSpec> = Object.freeze({});

function constrains(value: string | undefined): value is string {
  return value !== undefined && value !== '' && value !== ANY;
}

export function isEmptyFilter(spec: FilterSpec): boolean {
  return !spec.search?.trim() && !constrains(spec.protocol) && !constrains(spec.status) && !constrains(spec.username);
}

/**
 * Text the search box matches against: process name, Pid and both addresses.
 * The process name is the connection's own, falling back to its owner's.
 */
export function searchableText(conn: ConnectionRecord, owner?: ProcessRecord): string {
  const name = conn.Name || owner?.Name || '';
  return `${name} ${conn.Pid} ${conn.Laddr} ${conn.Raddr}`.toLowerCase();
}

/** `owner` is the process the connection's Pid resolves to, if any. */
export function connectionMatches(conn: ConnectionRecord, spec: FilterSpec, owner?: ProcessRecord): boolean {
  if (constrains(spec.protocol) && conn.Type !== spec.protocol) return false;
  if (constrains(spec.status) && conn.Status !== spec.status) return false;
  if (constrains(spec.username)) {
    const username = owner?.Username || conn.Username;
    if (username !== spec.username) return false;
  }
  const needle = spec.search?.trim().toLowerCase();
  if (needle && !searchableText(conn, owner).includes(needle)) return false;
  return true;
}

/**
 * Connections of `snapshot` matching `spec`, in snapshot order. Never mutates
 * the snapshot; an empty spec returns every connection.
 */
export function applyFilter(snapshot: Snapshot, spec: FilterSpec): FilteredConnection[] {
  const result: FilteredConnection[] = [];
  snapshot.connections.forEach((connection, i) => {
    const owner = snapshot.processByPid.get(connection.Pid);
    if (connectionMatches(connection, spec, owner)) result.push({ index: i, connection });
  });
  return result;
}

type FilterListener = (view: ViewName, spec: Readonly<FilterSpec>) => void;

/**
 * Independent filter specs per consuming view. Results are only computed when
 * a caller asks for them.
 */
export class FilterEngine {
  private readonly specs = new Map<ViewName, Readonly<FilterSpec>>();
  private readonly listeners: Set<FilterListener> = new Set();

  get(view: ViewName): Readonly<FilterSpec> {
    return this.specs.get(view) ?? EMPTY_FILTER;
  }

  set(view: ViewName, spec: FilterSpec): Readonly<FilterSpec> {
    const next = Object.freeze({ ...spec });
    this.specs.set(view, next);
    this.notify(view, next);
    return next;
  }

  update(view: ViewName, patch: Partial<FilterSpec>): Readonly<FilterSpec> {
    return this.set(view, { ...this.get(view), ...patch });
  }

  clear(view: ViewName): void {
    this.specs.delete(view);
    this.notify(view, EMPTY_FILTER);
  }

  apply(view: ViewName, snapshot: Snapshot): FilteredConnection[] {
    return applyFilter(snapshot, this.get(view));
  }

  subscribe(listener: FilterListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(view: ViewName, spec: Readonly<FilterSpec>) {
    this.listeners.forEach(listener => listener(view, spec));
  }
}
