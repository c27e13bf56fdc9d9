/**
 * Quire — Feed Sources Index
 */

import type { Source } from '../../types';
import type { SourceConfig } from '../../config';
import { HttpFeedSource } from './http';

export { HttpFeedSource, USER_AGENT } from './http';
export { FileFeedSource } from './file';

/**
 * One network-backed source per configured entry. Entries are assumed
 * validated by the config layer.
 */
export function createSources(entries: readonly SourceConfig[]): Source[] {
  return entries.map(entry => new HttpFeedSource(entry.name, entry.url));
}
