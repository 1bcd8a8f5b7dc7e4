import type { CorrelationIndex } from './correlation.js';
import {
  type ConnectionRecord,
  HIGH_PORT_THRESHOLD,
  LOOPBACK_PREFIXES,
  type ProcessTrustPolicy,
  UNSPECIFIED_ADDRESSES,
  ZERO_TIMESTAMP,
} from './types.js';
import type {
  DashboardMetrics,
  TimelineEntry,
  TopTalker,
  UntrustedProcessEntry,
} from '../shared/types.js';

export const UNKNOWN_UPTIME = 'unknown';
const ACTIVITY_FEED_SIZE = 15;
const TOP_TALKER_COUNT = 10;

export function isTrusted(conn: ConnectionRecord): boolean {
  return conn.Authenticode?.Trusted === 'trusted';
}

export function isExternal(conn: ConnectionRecord): boolean {
  if (conn.Status !== 'ESTAB') return false;
  if (!conn.Raddr.trim()) return false;
  return !LOOPBACK_PREFIXES.some(prefix => conn.Raddr.startsWith(prefix));
}

export function isHighPort(conn: ConnectionRecord): boolean {
  return conn.Lport > HIGH_PORT_THRESHOLD;
}

function isRoutableRemote(raddr: string): boolean {
  return !UNSPECIFIED_ADDRESSES.some(addr => addr === raddr);
}

/**
 * Human-scale age of a process: "3d 4h", "2h 15m" or "42m".
 * Returns "unknown" for the zero sentinel, unparsable and future timestamps.
 */
export function uptime(startTime: string, now: Date = new Date()): string {
  if (!startTime || startTime === ZERO_TIMESTAMP) return UNKNOWN_UPTIME;

  // Capture tooling emits up to nanosecond precision.
  const started = Date.parse(startTime.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(started)) return UNKNOWN_UPTIME;

  const elapsed = now.getTime() - started;
  if (elapsed < 0) return UNKNOWN_UPTIME;

  const totalMinutes = Math.floor(elapsed / 60_000);
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

export function formatStamp(stamp: string): string {
  return stamp.slice(0, 19).replace('T', ' ');
}

export function abbreviateCallChain(chain: string, keep = 3): string {
  const parts = chain.split(' -> ');
  if (parts.length <= keep) return chain;
  return '...' + parts.slice(-keep).join(' -> ');
}

export function processTrustOf(
  connections: readonly ConnectionRecord[],
  policy: ProcessTrustPolicy
): boolean {
  if (connections.length === 0) return false;
  switch (policy) {
    case 'first-connection': {
      const [first] = connections;
      return first !== undefined && isTrusted(first);
    }
    case 'majority':
      return connections.filter(isTrusted).length * 2 > connections.length;
    case 'all':
      return connections.every(isTrusted);
  }
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Per-connection classifications and aggregates, computed once per snapshot.
 * Uptime is the only value derived on access since it depends on the clock.
 */
export class MetricsEngine {
  private readonly trusted: boolean[];
  private readonly external: boolean[];
  private readonly highPort: boolean[];
  private readonly trustByPid = new Map<number, boolean>();

  readonly dashboard: DashboardMetrics;
  readonly untrustedProcesses: UntrustedProcessEntry[];
  readonly externalIndexes: number[];
  readonly highPortCount: number;
  readonly topTalkers: TopTalker[];
  readonly activityIndexes: number[];
  readonly timeline: TimelineEntry[];

  constructor(private readonly index: CorrelationIndex, readonly policy: ProcessTrustPolicy = 'first-connection') {
    const { snapshot } = index;
    const connections = snapshot.connections;

    this.trusted = connections.map(isTrusted);
    this.external = connections.map(isExternal);
    this.highPort = connections.map(isHighPort);

    for (const pid of index.allKnownPids()) {
      this.trustByPid.set(pid, processTrustOf(index.connectionsFor(pid), policy));
    }

    const byProtocol: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    const remotes = new Set<string>();
    const untrustedByName = new Map<string, number>();
    const talkers = new Map<string, number>();
    this.externalIndexes = [];
    let untrustedConnections = 0;
    let highPortCount = 0;

    connections.forEach((conn, i) => {
      if (conn.Type) increment(byProtocol, conn.Type);
      if (conn.Status) increment(byStatus, conn.Status);
      if (conn.Raddr && isRoutableRemote(conn.Raddr)) remotes.add(conn.Raddr);
      if (this.external[i]) this.externalIndexes.push(i);
      if (this.highPort[i]) highPortCount++;

      const name = this.displayName(conn);
      talkers.set(name, (talkers.get(name) ?? 0) + 1);
      if (!this.trusted[i]) {
        untrustedConnections++;
        untrustedByName.set(name, (untrustedByName.get(name) ?? 0) + 1);
      }
    });

    // Orphan Pids count too.
    const processesWithConnections = new Set(connections.map(conn => conn.Pid)).size;

    this.highPortCount = highPortCount;
    this.untrustedProcesses = [...untrustedByName]
      .map(([name, count]) => ({ name, connections: count }))
      .sort((a, b) => a.name.localeCompare(b.name));
    this.topTalkers = [...talkers]
      .map(([name, count]) => ({ name, connections: count }))
      .sort((a, b) => b.connections - a.connections)
      .slice(0, TOP_TALKER_COUNT);

    this.dashboard = {
      totalConnections: connections.length,
      totalProcesses: snapshot.processes.length,
      byProtocol,
      byStatus,
      tcp: byProtocol['TCP'] ?? 0,
      udp: byProtocol['UDP'] ?? 0,
      listening: byStatus['LISTEN'] ?? 0,
      established: byStatus['ESTAB'] ?? 0,
      external: this.externalIndexes.length,
      uniqueRemoteIps: remotes.size,
      processesWithConnections,
      untrustedConnections,
      untrustedProcesses: untrustedByName.size,
    };

    this.activityIndexes = connections
      .map((conn, i) => ({ stamp: conn.Timestamp, i }))
      .sort((a, b) => (a.stamp < b.stamp ? 1 : a.stamp > b.stamp ? -1 : 0))
      .slice(0, ACTIVITY_FEED_SIZE)
      .map(entry => entry.i);

    this.timeline = [...snapshot.processes]
      .sort((a, b) => (a.StartTime < b.StartTime ? 1 : a.StartTime > b.StartTime ? -1 : 0))
      .map(proc => {
        const conns = index.connectionsFor(proc.Pid);
        return {
          pid: proc.Pid,
          ppid: proc.Ppid,
          name: proc.Name,
          username: proc.Username,
          startTime: formatStamp(proc.StartTime),
          connections: conns.length,
          listening: conns.filter(c => c.Status === 'LISTEN').length,
          established: conns.filter(c => c.Status === 'ESTAB').length,
          callChain: proc.CallChain,
        };
      });
  }

  /** Connection's own Name, then its owner's, then "Unknown". */
  displayName(conn: ConnectionRecord): string {
    return conn.Name || this.index.ownerOf(conn)?.Name || 'Unknown';
  }

  isTrustedAt(position: number): boolean {
    return this.trusted[position] ?? false;
  }

  isExternalAt(position: number): boolean {
    return this.external[position] ?? false;
  }

  isHighPortAt(position: number): boolean {
    return this.highPort[position] ?? false;
  }

  /**
   * Process-level trust under the configured policy. The default samples the
   * first associated connection, an approximation rather than a verdict.
   */
  processTrust(pid: number): boolean {
    return this.trustByPid.get(pid) ?? processTrustOf(this.index.connectionsFor(pid), this.policy);
  }

  uptimeOf(pid: number, now: Date = new Date()): string {
    const proc = this.index.processFor(pid);
    return proc ? uptime(proc.StartTime, now) : UNKNOWN_UPTIME;
  }
}
