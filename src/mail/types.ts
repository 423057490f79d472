/**
 * Account credentials used for both SMTP and IMAP.
 * Opaque strings, never validated here. A bad value only fails on the wire.
 */
export interface Credentials {
  login: string;
  password: string;
}

/**
 * Hostnames of the provider's SMTP and IMAP servers.
 * Ports are protocol constants (see client.ts), not configuration.
 */
export interface ServerConfig {
  smtpHost: string;
  imapHost: string;
}

export type MailClientConfig = Credentials & ServerConfig;

/**
 * An email to submit over SMTP.
 * Recipient order is kept in the To header but has no effect on delivery.
 */
export interface OutgoingMessage {
  subject: string;
  recipients: readonly string[];
  body: string;
}

/**
 * A message fetched over IMAP and parsed from its RFC 822 source.
 */
export interface InboundMessage {
  /** Header name (lower-cased) to decoded value */
  headers: Record<string, string>;
  /** Plain text body, empty when the message has none */
  body: string;
}
