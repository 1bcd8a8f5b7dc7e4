import { isRawRecord, normalizeConnection, normalizeProcess } from './records.js';
import type { ConnectionRecord, LoadDiagnostics, ProcessRecord, Snapshot } from './types.js';

function vocabulary(values: Iterable<string>): string[] {
  return [...new Set(values)].filter(v => v !== '').sort();
}

/**
 * Builds an immutable snapshot from two already-parsed collections.
 *
 * Inputs are only expected to be keyed mappings; anything else is counted in
 * the diagnostics and skipped. When two processes share a Pid the later one
 * wins the Pid lookup (both stay in `processes`) and the Pid is reported in
 * `diagnostics.duplicatePids`.
 */
export function loadSnapshot(
  processInputs: readonly unknown[],
  connectionInputs: readonly unknown[],
  loadedAt: Date = new Date()
): Snapshot {
  const processes: ProcessRecord[] = [];
  const connections: ConnectionRecord[] = [];
  const processByPid = new Map<number, ProcessRecord>();
  const duplicates = new Set<number>();
  let skippedProcesses = 0;
  let skippedConnections = 0;

  for (const raw of processInputs) {
    if (!isRawRecord(raw)) {
      skippedProcesses++;
      continue;
    }
    const proc = Object.freeze(normalizeProcess(raw));
    if (processByPid.has(proc.Pid)) duplicates.add(proc.Pid);
    processByPid.set(proc.Pid, proc);
    processes.push(proc);
  }

  for (const raw of connectionInputs) {
    if (!isRawRecord(raw)) {
      skippedConnections++;
      continue;
    }
    const conn = normalizeConnection(raw);
    if (conn.Authenticode) Object.freeze(conn.Authenticode);
    connections.push(Object.freeze(conn));
  }

  const diagnostics: LoadDiagnostics = {
    duplicatePids: [...duplicates],
    skippedProcesses,
    skippedConnections,
  };

  return Object.freeze({
    processes: Object.freeze(processes),
    connections: Object.freeze(connections),
    processByPid,
    statuses: Object.freeze(vocabulary(connections.map(c => c.Status))),
    usernames: Object.freeze(vocabulary(processes.map(p => p.Username))),
    diagnostics: Object.freeze(diagnostics),
    loadedAt,
  });
}

export function emptySnapshot(): Snapshot {
  return loadSnapshot([], []);
}
