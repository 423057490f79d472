import type { SearchObject } from "imapflow";

/** Mailbox searched by receiveMessage. */
export const INBOX = "INBOX";

/**
 * Build the UID SEARCH criterion for receiveMessage.
 *
 * With a subject, matches on the Subject header (`HEADER Subject "<subject>"`
 * on the wire); without one, matches every message (`ALL`). The subject is
 * passed through verbatim; ImapFlow's string encoding is the only escaping.
 */
export function buildSearchCriterion(subject?: string): SearchObject {
  return subject ? { header: { Subject: subject } } : { all: true };
}

/**
 * Textual form of the criterion built by buildSearchCriterion, as it
 * appears in the UID SEARCH command.
 */
export function formatSearchCriterion(subject?: string): string {
  return subject ? `HEADER Subject "${subject}"` : "ALL";
}

/**
 * Pick the UID to fetch from a search result: the last one in the order the
 * server returned them, taken to be the most recent message. This relies on
 * the server assigning and returning UIDs in ascending order, which IMAP does
 * not guarantee everywhere.
 */
export function pickLatestUid(uids: readonly number[]): number | undefined {
  return uids.length > 0 ? uids[uids.length - 1] : undefined;
}
