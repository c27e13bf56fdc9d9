/**
 * Shared test helpers: fixture loading and in-process sources.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Item, Source } from '../src/types';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function fixture(name: string): Uint8Array {
  return readFileSync(fixturePath(name));
}

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function makeItem(sourceName: string, n: number): Item {
  return Object.freeze({
    id: `${sourceName}-${n}`,
    sourceName,
    title: `Article ${n}`,
    link: `https://example.com/${sourceName}/${n}`,
  });
}

interface StubSourceOptions {
  items?: Item[];
  delayMs?: number;
  error?: Error;
  /** Resolve late even after an abort, like a transport without cancellation */
  ignoreAbort?: boolean;
}

/**
 * In-process Source: resolves with fixed items, or rejects, after a delay.
 */
export class StubSource implements Source {
  readonly address: string;
  calls = 0;
  aborted = false;

  constructor(
    readonly name: string,
    private readonly options: StubSourceOptions = {}
  ) {
    this.address = `https://stub.example.com/${encodeURIComponent(name)}`;
  }

  fetch(signal?: AbortSignal): Promise<Item[]> {
    this.calls++;
    const { items = [], delayMs = 0, error, ignoreAbort = false } = this.options;

    return new Promise<Item[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (error) reject(error);
        else resolve(items);
      }, delayMs);

      signal?.addEventListener('abort', () => {
        this.aborted = true;
        if (ignoreAbort) return;
        clearTimeout(timer);
        reject(signal.reason);
      });
    });
  }
}
