/**
 * Trendwire — Error Types
 *
 * Every error raised by the service carries a stable `code` so the
 * serving layer and logs can tell failure classes apart without
 * matching on messages.
 */

export type TrendwireErrorCode =
  | 'SOURCE_FETCH_FAILED'
  | 'UNKNOWN_SOURCE_CONFIGURED'
  | 'REFRESH_CYCLE_FAILED'
  | 'INVALID_CONFIGURATION';

export abstract class TrendwireError extends Error {
  abstract readonly code: TrendwireErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single adapter failed to produce items (transport, status or payload).
 */
export class SourceFetchError extends TrendwireError {
  readonly code = 'SOURCE_FETCH_FAILED' as const;
  readonly source: string;
  readonly status?: number;

  constructor(source: string, message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.source = source;
    this.status = options.status;
  }
}

/**
 * Configured source names with no matching adapter.
 */
export class UnknownSourceConfigured extends TrendwireError {
  readonly code = 'UNKNOWN_SOURCE_CONFIGURED' as const;
  readonly names: string[];

  constructor(names: string[]) {
    super(`Unknown trending sources skipped: ${names.join(', ')}`);
    this.names = names;
  }
}

/**
 * Unexpected failure inside one scheduled refresh cycle.
 */
export class RefreshCycleFailure extends TrendwireError {
  readonly code = 'REFRESH_CYCLE_FAILED' as const;

  constructor(cause: unknown) {
    super(`Trending refresh cycle failed: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigurationError extends TrendwireError {
  readonly code = 'INVALID_CONFIGURATION' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
