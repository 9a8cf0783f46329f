/**
 * Unified line diff between the original and the rewritten SQL.
 */

import { structuredPatch } from 'diff';

export const ORIGINAL_LABEL = 'original.sql';
export const OPTIMIZED_LABEL = 'optimized.sql';

/**
 * Hunk range as unified diff prints it: a one-line range is just its start;
 * an empty range starts one line earlier.
 */
function formatRange(start: number, length: number): string {
  if (length === 1) return String(start);
  if (length === 0) return `${start - 1},0`;
  return `${start},${length}`;
}

/**
 * `--- original.sql` / `+++ optimized.sql` headers followed by hunks, lines
 * joined with `\n`, no trailing newline. Identical inputs give ''.
 */
export function unifiedDiff(original: string, optimized: string, contextLines = 3): string {
  const patch = structuredPatch(
    ORIGINAL_LABEL,
    OPTIMIZED_LABEL,
    toDiffText(original),
    toDiffText(optimized),
    undefined,
    undefined,
    { context: contextLines },
  );

  if (patch.hunks.length === 0) return '';

  const out = [`--- ${ORIGINAL_LABEL}`, `+++ ${OPTIMIZED_LABEL}`];
  for (const hunk of patch.hunks) {
    out.push(
      `@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`,
    );
    out.push(...hunk.lines);
  }
  return out.join('\n');
}

/** CRLF and lone CR count as plain line breaks; the last line is newline-terminated. */
function toDiffText(text: string): string {
  const lf = text.replace(/\r\n?/g, '\n');
  return lf.endsWith('\n') ? lf : `${lf}\n`;
}
