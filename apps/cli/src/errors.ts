import { ConfigError } from '@querytune/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'INPUT_READ_FAILED'
  | 'CONFIG_INVALID'
  | 'MODEL_SETUP_FAILED'
  | 'EXPLAIN_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

/** A rejected optimization is not an error: its payload is printed, then the run exits with 3. */
export function outcomeExitCode(ok: boolean): number {
  return ok ? EXIT_CODE_SUCCESS : EXIT_CODE_POLICY;
}

/** Configuration problems surface as runtime errors carrying the violation list. */
export function fromConfigError(error: ConfigError): CliError {
  return runtimeError(error.message, 'CONFIG_INVALID', { violations: error.violations });
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError && error.kind === 'usage') return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}
