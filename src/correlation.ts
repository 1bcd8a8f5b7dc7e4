import type { ConnectionRecord, ProcessNode, ProcessRecord, Snapshot } from './types.js';

const NO_CONNECTIONS: readonly ConnectionRecord[] = Object.freeze([]);

// Mutable while the forest is being placed; frozen and handed out as ProcessNode.
interface NodeBuilder {
  readonly record: ProcessRecord;
  readonly children: NodeBuilder[];
  parent: NodeBuilder | undefined;
  connectionCount: number;
  depth: number;
}

/**
 * Process hierarchy and process/connection join for one snapshot.
 *
 * Everything is built in the constructor in a constant number of linear
 * passes; accessors are plain map lookups afterwards.
 */
export class CorrelationIndex {
  private readonly nodes = new Map<number, NodeBuilder>();
  private readonly roots: NodeBuilder[] = [];
  private readonly promotedRoots: number[] = [];
  private readonly byPid = new Map<number, ConnectionRecord[]>();
  private readonly positions = new Map<ConnectionRecord, number>();

  constructor(readonly snapshot: Snapshot) {
    snapshot.connections.forEach((conn, position) => {
      this.positions.set(conn, position);
      const list = this.byPid.get(conn.Pid);
      if (list) list.push(conn);
      else this.byPid.set(conn.Pid, [conn]);
    });
    this.buildForest();
  }

  private buildForest(): void {
    const { processByPid } = this.snapshot;
    const adjacency = new Map<number, number[]>();
    const rootPids: number[] = [];

    for (const proc of processByPid.values()) {
      this.nodes.set(proc.Pid, {
        record: proc,
        children: [],
        parent: undefined,
        connectionCount: this.byPid.get(proc.Pid)?.length ?? 0,
        depth: 0,
      });
      if (isRootRecord(proc, processByPid)) {
        rootPids.push(proc.Pid);
        continue;
      }
      const siblings = adjacency.get(proc.Ppid);
      if (siblings) siblings.push(proc.Pid);
      else adjacency.set(proc.Ppid, [proc.Pid]);
    }

    const visited = new Set<number>();
    for (const pid of rootPids) this.placeSubtree(pid, adjacency, visited);

    // Whatever is still unplaced hangs off a Ppid cycle no root reaches.
    for (const pid of processByPid.keys()) {
      if (visited.has(pid)) continue;
      this.promotedRoots.push(pid);
      this.placeSubtree(pid, adjacency, visited);
    }

    for (const node of this.nodes.values()) {
      Object.freeze(node.children);
      Object.freeze(node);
    }
  }

  private placeSubtree(rootPid: number, adjacency: Map<number, number[]>, visited: Set<number>): void {
    const root = this.nodes.get(rootPid);
    if (!root || visited.has(rootPid)) return;
    visited.add(rootPid);
    this.roots.push(root);

    const stack: NodeBuilder[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      const pending: NodeBuilder[] = [];
      for (const childPid of adjacency.get(node.record.Pid) ?? []) {
        const child = this.nodes.get(childPid);
        if (!child || visited.has(childPid)) continue;
        visited.add(childPid);
        child.parent = node;
        child.depth = node.depth + 1;
        node.children.push(child);
        pending.push(child);
      }
      for (let i = pending.length - 1; i >= 0; i--) {
        const next = pending[i];
        if (next) stack.push(next);
      }
    }
  }

  rootNodes(): readonly ProcessNode[] {
    return this.roots;
  }

  /** Roots that were only reachable through a Ppid cycle. */
  cycleRoots(): readonly number[] {
    return this.promotedRoots;
  }

  nodeFor(pid: number): ProcessNode | undefined {
    return this.nodes.get(pid);
  }

  processFor(pid: number): ProcessRecord | undefined {
    return this.snapshot.processByPid.get(pid);
  }

  childrenOf(pid: number): ProcessRecord[] {
    return this.nodes.get(pid)?.children.map(child => child.record) ?? [];
  }

  parentOf(pid: number): ProcessRecord | undefined {
    return this.nodes.get(pid)?.parent?.record;
  }

  connectionsFor(pid: number): readonly ConnectionRecord[] {
    return this.byPid.get(pid) ?? NO_CONNECTIONS;
  }

  ownerOf(conn: ConnectionRecord): ProcessRecord | undefined {
    return this.snapshot.processByPid.get(conn.Pid);
  }

  /** Position of a connection in the snapshot, by identity; -1 if foreign. */
  indexOf(conn: ConnectionRecord): number {
    return this.positions.get(conn) ?? -1;
  }

  allKnownPids(): number[] {
    return [...this.snapshot.processByPid.keys()];
  }

  /** Pids from the tree root down to `pid`, or [] when `pid` is unknown. */
  lineageOf(pid: number): number[] {
    const path: number[] = [];
    let node = this.nodes.get(pid);
    while (node) {
      path.push(node.record.Pid);
      node = node.parent;
    }
    return path.reverse();
  }
}

function isRootRecord(proc: ProcessRecord, processByPid: ReadonlyMap<number, ProcessRecord>): boolean {
  return proc.Ppid === 0 || !processByPid.has(proc.Ppid);
}

export function processLabel(proc: ProcessRecord): string {
  return `${proc.Name} (${proc.Pid})`;
}

export interface ForestEntry {
  node: ProcessNode;
  children: ForestEntry[];
}

/**
 * Prunes the forest to nodes whose label matches `search` (case-insensitive)
 * plus their ancestors. An empty search keeps every node.
 */
export function filterForest(index: CorrelationIndex, search = ''): ForestEntry[] {
  const needle = search.trim().toLowerCase();
  const kept = new Map<ProcessNode, ForestEntry>();

  // Post-order without recursion: children are decided before their parent.
  const order: ProcessNode[] = [];
  const stack: ProcessNode[] = [...index.rootNodes()];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    order.push(node);
    for (const child of node.children) stack.push(child);
  }

  for (let i = order.length - 1; i >= 0; i--) {
    const node = order[i];
    if (!node) continue;
    const children: ForestEntry[] = [];
    for (const child of node.children) {
      const entry = kept.get(child);
      if (entry) children.push(entry);
    }
    const matches = !needle || processLabel(node.record).toLowerCase().includes(needle);
    if (matches || children.length > 0) kept.set(node, { node, children });
  }

  const forest: ForestEntry[] = [];
  for (const root of index.rootNodes()) {
    const entry = kept.get(root);
    if (entry) forest.push(entry);
  }
  return forest;
}
