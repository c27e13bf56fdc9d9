/**
 * Quire — Feeds Module
 *
 * Concurrent fetch of RSS/Atom sources into normalized Items.
 */

export { FeedSource } from './base';
export { HttpFeedSource, FileFeedSource, createSources, USER_AGENT } from './sources';

export {
  decodeFeed,
  buildItem,
  rssAttempt,
  atomAttempt,
  SCHEMA_ATTEMPTS,
  type SchemaAttempt,
  type SchemaAttemptResult,
} from './decoder';

export { parseFeedDate, tryParseFeedDate } from './dates';
export { cleanText, decodeHtmlEntities, normalizeWhitespace } from './text';

export { RunStatsAggregator, formatRunSummary } from './stats';

export {
  fetchAll,
  fetchOne,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  type FetchOptions,
  type FetchAllResult,
} from './aggregator';
