/**
 * Shared ajv construction and error formatting.
 */

import AjvModule from 'ajv';
import type { ErrorObject, Options } from 'ajv';

export type Ajv = InstanceType<typeof AjvModule.default>;

export function createAjv(options: Options = {}): Ajv {
  return new AjvModule.default({ allErrors: true, ...options });
}

/** One line per violation: `/path: message`, joined with `; `. */
export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'Unknown validation error';
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}
