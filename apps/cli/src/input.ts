/**
 * Where a command's SQL comes from: `--sql`, `--file`, or piped stdin.
 */

import { readFile } from 'node:fs/promises';
import { usageError } from './errors.js';

export interface SqlInputOptions {
  sql?: string;
  file?: string;
}

export function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    stream.setEncoding('utf-8');
    stream.on('data', (chunk: string) => (data += chunk));
    stream.on('end', () => resolve(data));
    stream.on('error', reject);
  });
}

/** Stdin as the reader sees it; `isTTY` is set only on an interactive terminal. */
export type SqlInputStream = NodeJS.ReadableStream & { isTTY?: boolean };

export async function readSqlInput(
  opts: SqlInputOptions,
  stdin: SqlInputStream = process.stdin,
): Promise<string> {
  if (opts.sql !== undefined && opts.file !== undefined) {
    throw usageError('Use either --sql or --file, not both.');
  }

  let sql: string;
  if (opts.sql !== undefined) {
    sql = opts.sql;
  } else if (opts.file !== undefined) {
    try {
      sql = await readFile(opts.file, 'utf-8');
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw usageError(`Cannot read SQL file: ${msg}`, 'INPUT_READ_FAILED');
    }
  } else {
    if (stdin.isTTY) {
      throw usageError('Provide SQL via --sql, --file, or pipe SQL via stdin.');
    }
    sql = await readStdin(stdin);
  }

  if (!sql.trim()) {
    throw usageError('Empty SQL statement.');
  }
  return sql.trim();
}
