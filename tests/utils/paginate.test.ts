import { describe, expect, it, vi } from 'vitest';
import { collectPages, paginate, type Page } from '../../src/utils/paginate';

function pagesFrom(pages: Array<Page<number>>) {
  return vi.fn(async (cursor: string | undefined) => {
    const index = cursor ? Number(cursor) : 0;
    return pages[index];
  });
}

describe('paginate', () => {
  it('follows cursors until the token is empty', async () => {
    const fetchPage = pagesFrom([
      { items: [1, 2], nextCursor: '1' },
      { items: [3], nextCursor: '2' },
      { items: [4], nextCursor: '' },
    ]);

    const seen: number[][] = [];
    for await (const items of paginate(fetchPage)) {
      seen.push(items);
    }

    expect(seen).toEqual([[1, 2], [3], [4]]);
    expect(fetchPage.mock.calls.map(call => call[0])).toEqual([undefined, '1', '2']);
  });

  it('stops when the continuation token is absent', async () => {
    const fetchPage = pagesFrom([{ items: [7] }]);

    await expect(collectPages(fetchPage)).resolves.toEqual([7]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('fetches lazily, one page per step', async () => {
    const fetchPage = pagesFrom([
      { items: [1], nextCursor: '1' },
      { items: [2], nextCursor: '' },
    ]);

    const iterator = paginate(fetchPage);
    expect(fetchPage).not.toHaveBeenCalled();

    await iterator.next();
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('propagates a page failure without retrying', async () => {
    const fetchPage = vi
      .fn<(cursor: string | undefined) => Promise<Page<number>>>()
      .mockResolvedValueOnce({ items: [1], nextCursor: 'next' })
      .mockRejectedValueOnce(new Error('ratelimited'));

    await expect(collectPages(fetchPage)).rejects.toThrow('ratelimited');
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });
});
