import { formatSearchCriterion } from "./search.js";

/**
 * Raised by receiveMessage when the UID search matches nothing.
 * Nothing is fetched in that case.
 */
export class NoMatchingMessageError extends Error {
  readonly subject: string | undefined;
  /** The UID SEARCH criterion that came back empty */
  readonly criterion: string;

  constructor(subject?: string) {
    super("There are no messages with the given header");
    this.name = "NoMatchingMessageError";
    this.subject = subject;
    this.criterion = formatSearchCriterion(subject);
  }
}

/**
 * Raised when the server answers a UID FETCH without the message source.
 */
export class MessageFetchError extends Error {
  readonly uid: number;

  constructor(uid: number) {
    super(`Message with UID ${uid} could not be fetched`);
    this.name = "MessageFetchError";
    this.uid = uid;
  }
}

export type MailProtocol = "SMTP" | "IMAP";

/**
 * Turn a mail transport error into a readable line for MCP callers.
 *
 * MailClient itself never translates errors; this is only used at the
 * tool boundary. Inspects the properties nodemailer, ImapFlow and Node.js
 * set on their errors.
 */
export function describeMailError(
  error: unknown,
  protocol: MailProtocol,
  host: string,
  port: number
): string {
  if (!(error instanceof Error)) {
    return `${protocol} error: ${String(error)}`;
  }

  if (error instanceof NoMatchingMessageError || error instanceof MessageFetchError) {
    return error.message;
  }

  const err = error as Error & {
    authenticationFailed?: boolean;
    code?: string;
    responseCode?: number;
  };

  // ImapFlow flags auth failures; nodemailer uses EAUTH / SMTP 535
  if (err.authenticationFailed || err.code === "EAUTH" || err.responseCode === 535) {
    return `${protocol} authentication failed — check MAIL_LOGIN and MAIL_PASSWORD.`;
  }

  if (err.code === "ECONNREFUSED") {
    return `Cannot reach ${protocol} server at ${host}:${port} — connection refused.`;
  }

  if (err.code === "ENOTFOUND") {
    return `Cannot resolve ${protocol} server hostname '${host}'.`;
  }

  if (
    err.code === "ETIMEDOUT" ||
    err.code === "CONNECT_TIMEOUT" ||
    err.code === "ETIMEOUT"
  ) {
    return `Connection to ${protocol} server timed out.`;
  }

  if (
    err.code === "ETLS" ||
    err.code?.startsWith("ERR_TLS") ||
    /tls|certificate/i.test(err.message)
  ) {
    return `TLS/SSL error talking to ${protocol} server at ${host}:${port}.`;
  }

  return `${protocol} error: ${err.message}`;
}
