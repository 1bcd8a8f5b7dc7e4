// Field names mirror the capture tooling's NDJSON output exactly.

export interface AuthenticodeInfo {
  Trusted?: string;
}

export interface ProcessRecord {
  Pid: number;
  Ppid: number;
  Name: string;
  Username: string;
  Exe: string;
  CommandLine: string;
  StartTime: string;
  CallChain: string;
}

export interface ConnectionRecord {
  Pid: number;
  Name: string;
  Type: string;
  Family: string;
  Status: string;
  Laddr: string;
  Lport: number;
  Raddr: string;
  Rport: number;
  Username: string;
  Timestamp: string;
  Authenticode: AuthenticodeInfo | null;
}

export type ConnectionProtocol = 'TCP' | 'UDP';

export interface ProcessNode {
  readonly record: ProcessRecord;
  readonly children: readonly ProcessNode[];
  // Lookup only; the parent owns this node through `children`.
  readonly parent: ProcessNode | undefined;
  readonly connectionCount: number;
  readonly depth: number;
}

export interface LoadDiagnostics {
  duplicatePids: number[];
  skippedProcesses: number;
  skippedConnections: number;
}

export interface Snapshot {
  readonly processes: readonly ProcessRecord[];
  readonly connections: readonly ConnectionRecord[];
  readonly processByPid: ReadonlyMap<number, ProcessRecord>;
  readonly statuses: readonly string[];
  readonly usernames: readonly string[];
  readonly diagnostics: Readonly<LoadDiagnostics>;
  readonly loadedAt: Date;
}

export type ProcessTrustPolicy = 'first-connection' | 'majority' | 'all';

export const ZERO_TIMESTAMP = '0001-01-01T00:00:00Z';

export const LOOPBACK_PREFIXES = ['127.', '::1'] as const;

export const UNSPECIFIED_ADDRESSES = ['', '0.0.0.0', '::'] as const;

// IANA dynamic/private range starts here.
export const HIGH_PORT_THRESHOLD = 49152;
