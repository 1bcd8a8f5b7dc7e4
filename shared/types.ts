/**
 * Shared type definitions for netlineage
 * Used by the engine, the HTTP service and the terminal viewer
 */

import type { ConnectionRecord, ProcessRecord } from '../src/types.js';

// ============================================
// Views
// ============================================

export const VIEW_NAMES = ['dashboard', 'grid', 'intel', 'security', 'tree', 'timeline', 'table'] as const;

export type ViewName = typeof VIEW_NAMES[number];

export type ViewEmphasis = 'external' | 'untrusted';

// ============================================
// Metrics
// ============================================

export interface DashboardMetrics {
  totalConnections: number;
  totalProcesses: number;
  byProtocol: Record<string, number>;
  byStatus: Record<string, number>;
  tcp: number;
  udp: number;
  listening: number;
  established: number;
  external: number;
  uniqueRemoteIps: number;
  processesWithConnections: number;
  untrustedConnections: number;
  // Distinct process names, not connections
  untrustedProcesses: number;
}

export interface UntrustedProcessEntry {
  name: string;
  connections: number;
}

export interface SecuritySummary {
  untrustedProcesses: UntrustedProcessEntry[];
  externalConnections: ConnectionRow[];
  highPortConnections: number;
}

export interface TopTalker {
  name: string;
  connections: number;
}

export interface TimelineEntry {
  pid: number;
  ppid: number;
  name: string;
  username: string;
  startTime: string;
  connections: number;
  listening: number;
  established: number;
  callChain: string;
}

// ============================================
// Rows and details
// ============================================

/**
 * One connection resolved against its owning process, as the table and grid
 * views display it. `index` is the connection's position in the snapshot.
 */
export interface ConnectionRow {
  index: number;
  pid: number;
  ppid: number | null;
  name: string;
  protocol: string;
  family: string;
  status: string;
  laddr: string;
  lport: number;
  raddr: string;
  rport: number;
  username: string;
  startTime: string;
  uptime: string;
  callChain: string;
  trusted: boolean;
  external: boolean;
  highPort: boolean;
  timestamp: string;
  ownerKnown: boolean;
}

export interface ConnectionDetail {
  index: number;
  connection: ConnectionRecord;
  owner: ProcessRecord | null;
  username: string;
  trusted: boolean;
  external: boolean;
}

export interface ProcessDetail {
  process: ProcessRecord;
  parent: ProcessRecord | null;
  children: number[];
  lineage: number[];
  trusted: boolean;
  uptime: string;
  connections: ConnectionRow[];
}

export interface ProcessTreeWire {
  pid: number;
  ppid: number;
  name: string;
  username: string;
  startTime: string;
  connections: number;
  trusted: boolean;
  children: ProcessTreeWire[];
}

export interface SnapshotInfo {
  loadedAt: string;
  processes: number;
  connections: number;
  statuses: string[];
  usernames: string[];
  duplicatePids: number[];
  cycleRoots: number[];
  skippedProcesses: number;
  skippedConnections: number;
}

// ============================================
// Navigation
// ============================================

export interface NavigationState {
  selectedPid: number | null;
  focusedConnection: ConnectionDetail | null;
  requestedView: ViewName | null;
  emphasis: ViewEmphasis | null;
}

// ============================================
// WebSocket Message Types
// ============================================

export type WebSocketMessage =
  | { type: 'initial'; data: { snapshot: SnapshotInfo; navigation: NavigationState } }
  | { type: 'navigation'; data: NavigationState }
  | { type: 'snapshot'; data: SnapshotInfo }
  | { type: 'pong' };
