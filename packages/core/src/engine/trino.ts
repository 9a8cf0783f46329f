/**
 * Trino adapter for the engine-execution handle.
 * Uses the `trino-client` driver; one client per executor, one executor per run.
 */

import { BasicAuth, Trino } from 'trino-client';
import type { EngineConfig } from '../config/config.js';
import type { EngineExecutor, EngineRow } from './types.js';

/** The subset of a Trino result page this adapter reads */
export interface TrinoResultPage {
  data?: unknown[];
  error?: { message: string };
}

/**
 * Drain every page of a Trino result in order.
 * A page carrying an error rejects; data entries that are not rows are skipped.
 */
export async function collectRows(pages: AsyncIterable<TrinoResultPage>): Promise<EngineRow[]> {
  const rows: EngineRow[] = [];
  for await (const page of pages) {
    if (page.error) {
      throw new Error(`Trino query failed: ${page.error.message}`);
    }
    for (const entry of page.data ?? []) {
      if (Array.isArray(entry)) {
        rows.push(entry);
      }
    }
  }
  return rows;
}

/**
 * Session properties sent with every statement. The explain timeout maps to
 * `query_max_run_time` unless the configured properties already set it.
 */
export function buildSessionProperties(cfg: EngineConfig): Record<string, string> {
  return {
    query_max_run_time: `${cfg.explainTimeoutSeconds}s`,
    ...cfg.sessionProperties,
  };
}

export class TrinoExecutor implements EngineExecutor {
  private client: Trino;

  constructor(cfg: EngineConfig) {
    const auth =
      cfg.basicUser && cfg.basicPassword
        ? new BasicAuth(cfg.basicUser, cfg.basicPassword)
        : new BasicAuth(cfg.user);

    this.client = Trino.create({
      server: `${cfg.httpScheme}://${cfg.host}:${cfg.port}`,
      catalog: cfg.catalog,
      schema: cfg.schema,
      source: cfg.source,
      session: buildSessionProperties(cfg),
      auth,
    });
  }

  async execute(sql: string): Promise<EngineRow[]> {
    const pages = await this.client.query(sql);
    return collectRows(pages);
  }
}

export function createEngineExecutor(cfg: EngineConfig): EngineExecutor {
  return new TrinoExecutor(cfg);
}
