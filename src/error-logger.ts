import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

export function errorLogDir(): string {
  return process.env.NETLINEAGE_LOG_DIR || path.join(os.homedir(), '.netlineage');
}

export interface ErrorDetail {
  name: string;
  message: string;
  stack?: string | undefined;
}

export interface ErrorLogEntry {
  timestamp: string;
  context: string;
  error: ErrorDetail;
}

/** Thrown values are not always Errors; strings and plain objects keep their content. */
export function describeError(error: unknown): ErrorDetail {
  if (error instanceof Error) return { name: error.name, message: error.message, stack: error.stack };
  if (typeof error === 'string') return { name: 'Error', message: error };
  if (typeof error === 'object' && error !== null) return { name: 'Error', message: JSON.stringify(error) };
  return { name: 'Error', message: 'Unknown error' };
}

export function toErrorLogEntry(context: string, error: unknown, now: Date = new Date()): ErrorLogEntry {
  return { timestamp: now.toISOString(), context, error: describeError(error) };
}

/**
 * Logs errors to a persistent log file with structured JSON format.
 * Falls back to console.error if file logging fails.
 *
 * @param context - Where the error occurred, e.g. "loader:readFile:/data/procs.json"
 */
export async function logError(context: string, error: unknown): Promise<void> {
  const entry = toErrorLogEntry(context, error);
  const dir = errorLogDir();

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.appendFile(path.join(dir, 'errors.log'), JSON.stringify(entry) + '\n');
  } catch (fileError) {
    console.error(`[${entry.timestamp}] ${context}:`, error);
    console.error('Failed to write to error log file:', fileError);
  }
}
