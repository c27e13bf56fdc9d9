/**
 * Quire — Error Types
 *
 * Every failure the fetch pipeline reports is one of these kinds.
 * The orchestrator turns them into failed outcomes; only DateParseError
 * is degraded to "no date" inside the decoder.
 */

export type QuireErrorKind =
  | 'transport'
  | 'timeout'
  | 'decode'
  | 'date_parse'
  | 'config';

export abstract class QuireError extends Error {
  abstract readonly kind: QuireErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Retrieval failed or returned a non-success status. */
export class TransportError extends QuireError {
  readonly kind = 'transport' as const;
}

/** The per-source bound elapsed before the fetch settled. */
export class TimeoutError extends QuireError {
  readonly kind = 'timeout' as const;

  constructor(
    readonly sourceName: string,
    readonly timeoutMs: number
  ) {
    super(`Request to ${sourceName} timed out after ${timeoutMs}ms`);
  }
}

/** Neither supported schema could be parsed from the payload. */
export class DecodeError extends QuireError {
  readonly kind = 'decode' as const;
}

export class DateParseError extends QuireError {
  readonly kind = 'date_parse' as const;

  constructor(readonly input: string) {
    super(`Unable to parse date: ${input}`);
  }
}

export class ConfigError extends QuireError {
  readonly kind = 'config' as const;
}

/**
 * Human-readable description of anything that was thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
