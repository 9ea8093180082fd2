import { describe, expect, it } from 'vitest';
import { buildThreadLink, parsePermalink, tsFromPermalinkDigits } from '../../src/utils/permalink';

describe('permalink parsing', () => {
  it('splits the numeric suffix into seconds and microseconds', () => {
    expect(parsePermalink('https://x.test/archives/C123/p1700000000123456')).toEqual({
      channelId: 'C123',
      ts: '1700000000.123456',
    });
  });

  it('finds the link inside surrounding text and ignores query strings', () => {
    expect(
      parsePermalink('check <https://acme.slack.com/archives/C0ABC12/p1712345678000100?thread_ts=1|this>'),
    ).toEqual({ channelId: 'C0ABC12', ts: '1712345678.000100' });
  });

  it('rejects links without a message suffix or with too few digits', () => {
    expect(parsePermalink('https://x.test/archives/C123')).toBeNull();
    expect(parsePermalink('https://x.test/archives/C123/p123456789012345')).toBeNull();
    expect(parsePermalink('not a link')).toBeNull();
  });

  it('keeps every leading digit in the seconds part', () => {
    expect(tsFromPermalinkDigits('17000000001234567')).toBe('17000000001.234567');
  });

  it('builds the web client thread link', () => {
    expect(buildThreadLink('T1', 'C123', '1700000000.123456')).toBe(
      'https://app.slack.com/client/T1/C123/thread/C123-1700000000123456',
    );
  });
});
