// MARK: - Permalink Parsing
// Locates a message from a shared message link

export interface MessageLocation {
  channelId: string;
  ts: string;
}

const MESSAGE_LINK_PATTERN = /https?:\/\/[^/\s]+\/archives\/([A-Z0-9]+)\/p(\d{16,})/;

/**
 * Permalinks carry the timestamp without its dot: the last six digits are
 * the microseconds.
 */
export function tsFromPermalinkDigits(digits: string): string {
  return `${digits.slice(0, -6)}.${digits.slice(-6)}`;
}

export function parsePermalink(text: string): MessageLocation | null {
  const match = MESSAGE_LINK_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, channelId, digits] = match;
  return { channelId, ts: tsFromPermalinkDigits(digits) };
}

/**
 * Web client link to the message's thread view.
 */
export function buildThreadLink(teamId: string, channelId: string, ts: string): string {
  return `https://app.slack.com/client/${teamId}/${channelId}/thread/${channelId}-${ts.replace('.', '')}`;
}
