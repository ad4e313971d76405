/**
 * Lazy iteration over paginated table scans.
 *
 * A scan page carries an opaque continuation key; the next page is requested
 * with it until a page arrives without one. The generator is single-use and
 * a failed page fetch rejects the iteration at that point.
 */

export interface ScanPage<T> {
  items: T[];
  /** Opaque continuation key; absent on the last page */
  lastEvaluatedKey?: string;
}

export interface ScanOptions {
  startKey?: string;
  limit?: number;
}

export type PageFetcher<T> = (startKey: string | undefined) => Promise<ScanPage<T>>;

export async function* drainPages<T>(fetchPage: PageFetcher<T>): AsyncGenerator<T, void, undefined> {
  let startKey: string | undefined;
  do {
    const page = await fetchPage(startKey);
    for (const item of page.items) {
      yield item;
    }
    startKey = page.lastEvaluatedKey;
  } while (startKey !== undefined);
}

/**
 * Drain every page into an array.
 */
export async function collectPages<T>(fetchPage: PageFetcher<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of drainPages(fetchPage)) {
    items.push(item);
  }
  return items;
}
