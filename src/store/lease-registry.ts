/**
 * In-memory registry of ingest leases, keyed by content id.
 *
 * The first caller for an id gets the lease; later callers get a promise
 * that settles when the holder releases, so they can re-check the store
 * instead of fetching the same bytes again.
 */

import type { ContentId } from '../hash/types.js';
import type { IngestLease, ReserveResult } from './types.js';

interface InFlight {
  settled: Promise<void>;
  resolve: () => void;
}

export class LeaseRegistry {
  private readonly inFlight: Map<ContentId, InFlight> = new Map();

  /** Number of leases currently held */
  get size(): number {
    return this.inFlight.size;
  }

  /** Whether a lease is currently held for the id */
  isHeld(contentId: ContentId): boolean {
    return this.inFlight.has(contentId);
  }

  reserve(contentId: ContentId): ReserveResult {
    const existing = this.inFlight.get(contentId);
    if (existing) {
      return { acquired: false, settled: existing.settled };
    }

    let resolve: () => void = () => undefined;
    const settled = new Promise<void>((r) => {
      resolve = r;
    });
    const entry: InFlight = { settled, resolve };
    this.inFlight.set(contentId, entry);

    let released = false;
    const lease: IngestLease = {
      contentId,
      release: (): void => {
        if (released) {
          return;
        }
        released = true;
        if (this.inFlight.get(contentId) === entry) {
          this.inFlight.delete(contentId);
        }
        entry.resolve();
      },
    };

    return { acquired: true, lease };
  }
}
