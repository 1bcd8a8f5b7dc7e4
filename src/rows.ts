import { filterForest, type ForestEntry } from './correlation.js';
import { abbreviateCallChain, formatStamp, uptime, UNKNOWN_UPTIME } from './metrics.js';
import type { ConnectionRecord } from './types.js';
import type { Workspace } from './workspace.js';
import type {
  ConnectionDetail,
  ConnectionRow,
  ProcessDetail,
  ProcessTreeWire,
  SecuritySummary,
  SnapshotInfo,
} from '../shared/types.js';

/** Owner's username when the owner is known and has one, else the connection's own. */
export function resolvedUsername(ws: Workspace, conn: ConnectionRecord): string {
  return ws.index.ownerOf(conn)?.Username || conn.Username;
}

export function toConnectionRow(ws: Workspace, position: number, now: Date = new Date()): ConnectionRow | null {
  const conn = ws.snapshot.connections[position];
  if (!conn) return null;
  const owner = ws.index.ownerOf(conn);

  return {
    index: position,
    pid: conn.Pid,
    ppid: owner ? owner.Ppid : null,
    name: ws.metrics.displayName(conn),
    protocol: conn.Type,
    family: conn.Family,
    status: conn.Status,
    laddr: conn.Laddr,
    lport: conn.Lport,
    raddr: conn.Raddr,
    rport: conn.Rport,
    username: resolvedUsername(ws, conn),
    startTime: owner?.StartTime ? formatStamp(owner.StartTime) : '',
    uptime: owner ? uptime(owner.StartTime, now) : UNKNOWN_UPTIME,
    callChain: abbreviateCallChain(owner?.CallChain ?? ''),
    trusted: ws.metrics.isTrustedAt(position),
    external: ws.metrics.isExternalAt(position),
    highPort: ws.metrics.isHighPortAt(position),
    timestamp: formatStamp(conn.Timestamp),
    ownerKnown: owner !== undefined,
  };
}

export function describeConnection(ws: Workspace, conn: ConnectionRecord): ConnectionDetail | null {
  const position = ws.index.indexOf(conn);
  if (position < 0) return null;
  return {
    index: position,
    connection: conn,
    owner: ws.index.ownerOf(conn) ?? null,
    username: resolvedUsername(ws, conn),
    trusted: ws.metrics.isTrustedAt(position),
    external: ws.metrics.isExternalAt(position),
  };
}

export function describeProcess(ws: Workspace, pid: number, now: Date = new Date()): ProcessDetail | null {
  const proc = ws.index.processFor(pid);
  if (!proc) return null;

  const connections: ConnectionRow[] = [];
  for (const conn of ws.index.connectionsFor(pid)) {
    const row = toConnectionRow(ws, ws.index.indexOf(conn), now);
    if (row) connections.push(row);
  }

  return {
    process: proc,
    parent: ws.index.parentOf(pid) ?? null,
    children: ws.index.childrenOf(pid).map(child => child.Pid),
    lineage: ws.index.lineageOf(pid),
    trusted: ws.metrics.processTrust(pid),
    uptime: uptime(proc.StartTime, now),
    connections,
  };
}

/** Wire form of the (optionally searched) process forest. */
export function processTree(ws: Workspace, search = ''): ProcessTreeWire[] {
  const toWire = (entry: ForestEntry): ProcessTreeWire => ({
    pid: entry.node.record.Pid,
    ppid: entry.node.record.Ppid,
    name: entry.node.record.Name,
    username: entry.node.record.Username,
    startTime: formatStamp(entry.node.record.StartTime),
    connections: entry.node.connectionCount,
    trusted: ws.metrics.processTrust(entry.node.record.Pid),
    children: [],
  });

  // Breadth-first so deep chains do not grow the call stack.
  const roots: ProcessTreeWire[] = [];
  const queue: Array<[ForestEntry, ProcessTreeWire]> = [];
  for (const entry of filterForest(ws.index, search)) {
    const wire = toWire(entry);
    roots.push(wire);
    queue.push([entry, wire]);
  }
  for (let head = 0; head < queue.length; head++) {
    const item = queue[head];
    if (!item) continue;
    const [entry, wire] = item;
    for (const child of entry.children) {
      const childWire = toWire(child);
      wire.children.push(childWire);
      queue.push([child, childWire]);
    }
  }
  return roots;
}

export function securityView(ws: Workspace, now: Date = new Date()): SecuritySummary {
  const externalConnections: ConnectionRow[] = [];
  for (const position of ws.metrics.externalIndexes) {
    const row = toConnectionRow(ws, position, now);
    if (row) externalConnections.push(row);
  }
  return {
    untrustedProcesses: ws.metrics.untrustedProcesses,
    externalConnections,
    highPortConnections: ws.metrics.highPortCount,
  };
}

export function activityFeed(ws: Workspace, now: Date = new Date()): ConnectionRow[] {
  const rows: ConnectionRow[] = [];
  for (const position of ws.metrics.activityIndexes) {
    const row = toConnectionRow(ws, position, now);
    if (row) rows.push(row);
  }
  return rows;
}

export function snapshotInfo(ws: Workspace): SnapshotInfo {
  const { snapshot } = ws;
  return {
    loadedAt: snapshot.loadedAt.toISOString(),
    processes: snapshot.processes.length,
    connections: snapshot.connections.length,
    statuses: [...snapshot.statuses],
    usernames: [...snapshot.usernames],
    duplicatePids: [...snapshot.diagnostics.duplicatePids],
    cycleRoots: [...ws.index.cycleRoots()],
    skippedProcesses: snapshot.diagnostics.skippedProcesses,
    skippedConnections: snapshot.diagnostics.skippedConnections,
  };
}
