/**
 * Quire — HTTP Feed Source
 *
 * Network-backed source: one GET per fetch, no retries.
 * A non-2xx status is a transport failure for this source.
 */

import { FeedSource } from '../base';
import { TransportError, describeError } from '../../lib/errors';

export const USER_AGENT = 'Quire/0.1.0';

const ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5';

export class HttpFeedSource extends FeedSource {
  protected async retrieve(signal?: AbortSignal): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(this.address, {
        headers: { 'User-Agent': USER_AGENT, Accept: ACCEPT },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw new TransportError(
        `Failed to fetch feed from ${this.address}: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      const status = [response.status, response.statusText].filter(Boolean).join(' ');
      throw new TransportError(`HTTP ${status} from ${this.address}`);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new TransportError(`Failed to read response body: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
