import fs from 'node:fs/promises';
import path from 'node:path';
import { isRawRecord, type RawRecord } from './records.js';
import { logError } from './error-logger.js';

export type CaptureKind = 'connections' | 'processes';

export interface FileReport {
  file: string;
  kind: CaptureKind | null;
  records: number;
  skippedLines: number;
  error?: string;
}

export interface LoadedCapture {
  processes: RawRecord[];
  connections: RawRecord[];
  files: FileReport[];
}

export interface ParsedLines {
  records: RawRecord[];
  skippedLines: number;
}

/** Parses newline-delimited JSON objects; undecodable or non-object lines are counted and skipped. */
export function parseNdjson(text: string): ParsedLines {
  const records: RawRecord[] = [];
  let skippedLines = 0;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const value: unknown = JSON.parse(trimmed);
      if (isRawRecord(value)) records.push(value);
      else skippedLines++;
    } catch {
      skippedLines++;
    }
  }
  return { records, skippedLines };
}

/** Decides a file's record type from the keys of its first object. */
export function sniffKind(first: RawRecord): CaptureKind | null {
  if ('Laddr' in first && 'Raddr' in first) return 'connections';
  if ('Ppid' in first && 'CommandLine' in first) return 'processes';
  return null;
}

function firstLine(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    if (line.trim()) return line.trim();
  }
  return '';
}

export async function loadFile(file: string): Promise<{ report: FileReport; records: RawRecord[] }> {
  const report: FileReport = { file, kind: null, records: 0, skippedLines: 0 };
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    await logError(`loader:readFile:${file}`, error);
    report.error = error instanceof Error ? error.message : 'Unreadable file';
    return { report, records: [] };
  }

  const head = firstLine(text);
  if (!head) {
    report.error = 'Empty file';
    return { report, records: [] };
  }

  let first: unknown;
  try {
    first = JSON.parse(head);
  } catch {
    report.error = 'Could not decode first line';
    return { report, records: [] };
  }
  if (!isRawRecord(first)) {
    report.error = 'First line is not a JSON object';
    return { report, records: [] };
  }

  report.kind = sniffKind(first);
  if (!report.kind) {
    report.error = 'Could not determine data type';
    return { report, records: [] };
  }

  const parsed = parseNdjson(text);
  report.records = parsed.records.length;
  report.skippedLines = parsed.skippedLines;
  return { report, records: parsed.records };
}

/**
 * Reads every *.json capture file directly inside `dir`, in name order.
 * Failures are reported per file and never abort the load.
 */
export async function loadDirectory(dir: string): Promise<LoadedCapture> {
  const capture: LoadedCapture = { processes: [], connections: [], files: [] };

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    await logError(`loader:readdir:${dir}`, error);
    capture.files.push({
      file: dir,
      kind: null,
      records: 0,
      skippedLines: 0,
      error: error instanceof Error ? error.message : 'Unreadable directory',
    });
    return capture;
  }

  const files = entries.filter(name => name.toLowerCase().endsWith('.json')).sort();
  for (const name of files) {
    const { report, records } = await loadFile(path.join(dir, name));
    capture.files.push(report);
    if (report.kind === 'connections') capture.connections.push(...records);
    else if (report.kind === 'processes') capture.processes.push(...records);
  }
  return capture;
}
