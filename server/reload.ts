import type { FastifyBaseLogger } from 'fastify';
import { loadDirectory, type FileReport } from '../src/loader.js';
import type { AnalysisSession } from '../src/session.js';
import { snapshotInfo } from '../src/rows.js';
import type { SnapshotInfo } from '../shared/types.js';

export interface ReloadResult {
  snapshot: SnapshotInfo;
  files: FileReport[];
}

/**
 * Loads every capture file in `dataDir` into the session. Problems that do not
 * stop the load (unreadable files, duplicate Pids, Ppid cycles) are logged as
 * warnings.
 */
export async function reloadFromDisk(
  session: AnalysisSession,
  dataDir: string,
  log: FastifyBaseLogger
): Promise<ReloadResult> {
  const capture = await loadDirectory(dataDir);

  for (const report of capture.files) {
    if (report.error) {
      log.warn({ file: report.file, reason: report.error }, 'capture file skipped');
    } else if (report.skippedLines > 0) {
      log.warn({ file: report.file, skippedLines: report.skippedLines }, 'undecodable lines skipped');
    }
  }

  const workspace = session.load(capture.processes, capture.connections);
  const info = snapshotInfo(workspace);

  if (info.duplicatePids.length > 0) {
    log.warn({ pids: info.duplicatePids }, 'duplicate pids, keeping the last record of each');
  }
  if (info.cycleRoots.length > 0) {
    log.warn({ pids: info.cycleRoots }, 'ppid cycle broken at these processes');
  }
  log.info({ processes: info.processes, connections: info.connections }, 'snapshot loaded');

  return { snapshot: info, files: capture.files };
}
