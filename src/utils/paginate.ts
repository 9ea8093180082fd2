// MARK: - Cursor Pagination
// Lazily follows continuation tokens over a paged API

export interface Page<T> {
  items: T[];
  /** Opaque continuation token; absent or empty on the last page. */
  nextCursor?: string;
}

export type PageFetcher<T> = (cursor: string | undefined) => Promise<Page<T>>;

/**
 * Yields one page per external call, passing each page's cursor to the next
 * call. A fetch failure ends iteration with that error. The collaborator is
 * trusted to terminate: a cursor that cycles back will loop.
 */
export async function* paginate<T>(fetchPage: PageFetcher<T>): AsyncGenerator<T[], void, undefined> {
  let cursor: string | undefined;

  do {
    const page = await fetchPage(cursor);
    yield page.items;
    cursor = page.nextCursor || undefined;
  } while (cursor);
}

/**
 * Drains every page into a single array.
 */
export async function collectPages<T>(fetchPage: PageFetcher<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const pageItems of paginate(fetchPage)) {
    items.push(...pageItems);
  }
  return items;
}
