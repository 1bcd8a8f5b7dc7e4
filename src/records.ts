import type { AuthenticodeInfo, ConnectionRecord, ProcessRecord } from './types.js';

export type RawRecord = Record<string, unknown>;

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(raw: RawRecord, key: string): string {
  const value = raw[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function int(raw: RawRecord, key: string): number {
  const value = raw[key];
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return parseInt(value, 10);
  return 0;
}

function authenticode(raw: RawRecord): AuthenticodeInfo | null {
  const value = raw['Authenticode'];
  if (!isRawRecord(value)) return null;
  const trusted = value['Trusted'];
  return typeof trusted === 'string' ? { Trusted: trusted } : {};
}

/**
 * Coerces a parsed process line into a ProcessRecord. Missing or mistyped
 * fields become '' or 0.
 */
export function normalizeProcess(raw: RawRecord): ProcessRecord {
  return {
    Pid: int(raw, 'Pid'),
    Ppid: int(raw, 'Ppid'),
    Name: str(raw, 'Name'),
    Username: str(raw, 'Username'),
    Exe: str(raw, 'Exe'),
    CommandLine: str(raw, 'CommandLine'),
    StartTime: str(raw, 'StartTime'),
    CallChain: str(raw, 'CallChain'),
  };
}

export function normalizeConnection(raw: RawRecord): ConnectionRecord {
  return {
    Pid: int(raw, 'Pid'),
    Name: str(raw, 'Name'),
    Type: str(raw, 'Type'),
    Family: str(raw, 'Family'),
    Status: str(raw, 'Status'),
    Laddr: str(raw, 'Laddr'),
    Lport: int(raw, 'Lport'),
    Raddr: str(raw, 'Raddr'),
    Rport: int(raw, 'Rport'),
    Username: str(raw, 'Username'),
    Timestamp: str(raw, 'Timestamp'),
    Authenticode: authenticode(raw),
  };
}
