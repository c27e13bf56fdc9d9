/**
 * Quire — Feed Source Base
 *
 * Shared base for sources that retrieve a raw feed body and hand it to
 * the decoder. Subclasses only implement retrieve().
 */

import type { Item, Source } from '../types';
import { logger, type Logger } from '../lib/logger';
import { decodeFeed } from './decoder';

export abstract class FeedSource implements Source {
  protected readonly logger: Logger;

  constructor(
    readonly name: string,
    readonly address: string
  ) {
    this.logger = logger.child({ source: name });
  }

  /**
   * Retrieve the raw body. Must not retry.
   */
  protected abstract retrieve(signal?: AbortSignal): Promise<Uint8Array>;

  async fetch(signal?: AbortSignal): Promise<Item[]> {
    const startTime = Date.now();
    const body = await this.retrieve(signal);
    const items = await decodeFeed(body, this.name);

    this.logger.debug('Feed decoded', {
      bytes: body.byteLength,
      items: items.length,
      durationMs: Date.now() - startTime,
    });

    return items;
  }
}
