/**
 * Quire — Type Exports
 */

export type {
  Item,
  Source,
  FetchOutcome,
  SourceError,
  RunStats,
} from './feed-item';
