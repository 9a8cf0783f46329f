/**
 * Engine-execution handle consumed by the optimization pipeline.
 * The pipeline only ever sends EXPLAIN, DESCRIBE and SHOW CREATE TABLE
 * statements through it; candidate SQL is never executed.
 */

/** One result row: column values in select-list order */
export type EngineRow = readonly unknown[];

export interface EngineExecutor {
  /**
   * Run a statement and return every row.
   * Rejects with an Error carrying the engine's message on any failure;
   * never resolves with a partial result.
   */
  execute(sql: string): Promise<EngineRow[]>;
}
