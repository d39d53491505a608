/**
 * Memoization cell for a lazily fetched value
 *
 * A cell is either `unfetched` or `fetched(value)`. Only a successful load
 * moves it to `fetched`; `reset()` moves it back unconditionally.
 */
export type CacheState<T> =
  | { state: 'unfetched' }
  | { state: 'fetched'; value: T };

/**
 * Result of a loader: `ok: false` means the fetch failed and nothing is stored
 */
export type LoadResult<T> =
  | { ok: true; value: T }
  | { ok: false; value: T };

export class Cached<T> {
  private current: CacheState<T> = { state: 'unfetched' };

  get isFetched(): boolean {
    return this.current.state === 'fetched';
  }

  /**
   * Returns the stored value, or runs the loader and stores what it
   * produced when it succeeded. A failed load's fallback value is returned
   * without being stored, so the next call tries again.
   */
  async resolve(loader: () => Promise<LoadResult<T>>): Promise<T> {
    if (this.current.state === 'fetched') {
      return this.current.value;
    }
    const result = await loader();
    if (result.ok) {
      this.current = { state: 'fetched', value: result.value };
    }
    return result.value;
  }

  reset(): void {
    this.current = { state: 'unfetched' };
  }
}
