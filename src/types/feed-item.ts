/**
 * Quire — Feed Item Types
 *
 * Every source, whatever its wire format, is normalized to Item.
 */

// ============================================================
// ITEM
// ============================================================

/**
 * Normalized content entry. Frozen once constructed.
 */
export interface Item {
  /** Opaque id generated at decode time, never derived from content */
  readonly id: string;
  readonly sourceName: string;
  /** Entity-decoded, whitespace-normalized, never empty */
  readonly title: string;
  /** Absolute URL, never empty */
  readonly link: string;
  readonly summary?: string;
  /** ISO-8601 UTC timestamp */
  readonly pubDate?: string;
}

// ============================================================
// SOURCE CONTRACT
// ============================================================

/**
 * Anything that can be asked for its name/address and fetched for items.
 *
 * `fetch` must not retry. The signal is aborted when the orchestrator
 * stops waiting; honouring it is up to the implementation.
 */
export interface Source {
  readonly name: string;
  readonly address: string;
  fetch(signal?: AbortSignal): Promise<Item[]>;
}

// ============================================================
// OUTCOMES & STATS
// ============================================================

export type FetchOutcome =
  | { success: true; sourceName: string; items: Item[] }
  | { success: false; sourceName: string; error: string };

export interface SourceError {
  sourceName: string;
  message: string;
}

/**
 * Aggregate of one fetch cycle.
 */
export interface RunStats {
  totalSources: number;
  succeeded: number;
  failed: number;
  totalItems: number;
  /** Completion order, which varies between runs */
  errors: SourceError[];
}
