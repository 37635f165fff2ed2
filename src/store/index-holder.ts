import type { LoadResult, LoadWarning } from '../types/index.js';
import { ContactIndex } from './contact-index.js';

export interface ReloadOutcome {
  generation: number;
  contacts: number;
  addresses: number;
  warnings: LoadWarning[];
}

/**
 * Owns the current index snapshot. Reloads run one at a time in request order;
 * readers keep the previous snapshot until the swap.
 */
export class IndexHolder {
  private snapshot: ContactIndex;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(initial: ContactIndex = ContactIndex.empty()) {
    this.snapshot = initial;
  }

  get current(): ContactIndex {
    return this.snapshot;
  }

  /** Publish a freshly built index under the next generation number. */
  swap(index: ContactIndex): ContactIndex {
    this.snapshot = index.withGeneration(this.snapshot.generation + 1);
    return this.snapshot;
  }

  reload(load: () => Promise<LoadResult>): Promise<ReloadOutcome> {
    const run = this.queue.then(async () => {
      const { index, warnings } = await load();
      const published = this.swap(index);
      return {
        generation: published.generation,
        contacts: published.contacts().length,
        addresses: published.size,
        warnings,
      };
    });
    // The queue only orders loads; each caller still receives its own rejection.
    this.queue = run.then(noop, noop);
    return run;
  }
}

function noop(): void {}
