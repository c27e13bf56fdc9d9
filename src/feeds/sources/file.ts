/**
 * Quire — File Feed Source
 *
 * Reads a feed document from the local filesystem. Useful for archived
 * feeds and offline runs; `address` is the file path.
 */

import { readFile } from 'fs/promises';
import { FeedSource } from '../base';
import { TransportError, describeError } from '../../lib/errors';

export class FileFeedSource extends FeedSource {
  protected async retrieve(signal?: AbortSignal): Promise<Uint8Array> {
    try {
      return await readFile(this.address, { signal });
    } catch (error) {
      throw new TransportError(`Failed to read feed file ${this.address}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
