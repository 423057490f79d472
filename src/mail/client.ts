import { ImapFlow } from "imapflow";
import nodemailer from "nodemailer";
import { simpleParser } from "mailparser";
import type { InboundMessage, MailClientConfig } from "./types.js";
import { buildMailOptions, toInboundMessage } from "./message.js";
import { INBOX, buildSearchCriterion, pickLatestUid } from "./search.js";
import { MessageFetchError, NoMatchingMessageError } from "./errors.js";

/** SMTP submission port; the session is upgraded with STARTTLS. */
export const SMTP_SUBMISSION_PORT = 587;

/** IMAP over implicit TLS. */
export const IMAP_TLS_PORT = 993;

/**
 * Sends one email over SMTP and fetches one email over IMAP.
 *
 * Holds no connection between calls: every operation opens its own session,
 * does its work and closes it on the way out, whether it succeeded or threw.
 * Transport and authentication errors reach the caller unchanged.
 */
export class MailClient {
  private config: MailClientConfig;

  constructor(config: MailClientConfig) {
    this.config = config;
  }

  get smtpHost(): string {
    return this.config.smtpHost;
  }

  get imapHost(): string {
    return this.config.imapHost;
  }

  /**
   * Compose a multipart message with one text/plain part, from the account
   * login, and submit it to every recipient.
   *
   * nodemailer runs EHLO, STARTTLS, EHLO and AUTH before submitting. Some
   * recipients may already be accepted when a later one fails; that is SMTP
   * behaviour and is not reconciled here.
   */
  async sendMessage(
    subject: string,
    recipients: readonly string[],
    body: string
  ): Promise<void> {
    const options = await buildMailOptions(this.config.login, {
      subject,
      recipients,
      body,
    });

    const transporter = nodemailer.createTransport({
      host: this.config.smtpHost,
      port: SMTP_SUBMISSION_PORT,
      secure: false,
      requireTLS: true,
      auth: {
        user: this.config.login,
        pass: this.config.password,
      },
    });

    try {
      await transporter.sendMail(options);
    } finally {
      transporter.close();
    }
  }

  /**
   * Fetch the latest INBOX message, optionally only among those whose Subject
   * header matches `subject`.
   *
   * Throws NoMatchingMessageError when the search finds nothing. The session
   * is logged out on success and closed on any failure, and the failure
   * itself is what the caller gets.
   */
  async receiveMessage(subject?: string): Promise<InboundMessage> {
    const flow = new ImapFlow({
      host: this.config.imapHost,
      port: IMAP_TLS_PORT,
      secure: true,
      auth: {
        user: this.config.login,
        pass: this.config.password,
      },
      logger: false,
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    flow.on("error", (error: Error) => {
      process.stderr.write(`IMAP connection error: ${error.message}\n`);
    });

    // A rejected connect() (e.g. LOGIN refused) leaves the socket open.
    try {
      await flow.connect();
    } catch (error) {
      closeQuietly(flow);
      throw error;
    }

    let message: InboundMessage;
    try {
      message = await readLatestMessage(flow, subject);
    } catch (error) {
      // LOGOUT needs a live session; close the socket instead.
      closeQuietly(flow);
      throw error;
    }

    await flow.logout();
    return message;
  }
}

async function readLatestMessage(
  flow: ImapFlow,
  subject: string | undefined
): Promise<InboundMessage> {
  await flow.list();

  const lock = await flow.getMailboxLock(INBOX);
  try {
    const uids = await flow.search(buildSearchCriterion(subject), {
      uid: true,
    });

    const uid = uids ? pickLatestUid(uids) : undefined;
    if (uid === undefined) {
      throw new NoMatchingMessageError(subject);
    }

    const msg = await flow.fetchOne(
      String(uid),
      { uid: true, source: true },
      { uid: true }
    );
    if (!msg || !msg.source) {
      throw new MessageFetchError(uid);
    }

    return toInboundMessage(await simpleParser(msg.source));
  } finally {
    lock.release();
  }
}

function closeQuietly(flow: ImapFlow): void {
  try {
    flow.close();
  } catch (closeError) {
    const reason = closeError instanceof Error ? closeError.message : String(closeError);
    process.stderr.write(`IMAP close error: ${reason}\n`);
  }
}

/**
 * Create a MailClient from environment variables.
 */
export function createClientFromEnv(): MailClient {
  const login = process.env.MAIL_LOGIN;
  const password = process.env.MAIL_PASSWORD;
  const smtpHost = process.env.SMTP_HOST;
  const imapHost = process.env.IMAP_HOST;

  if (!login) throw new Error("MAIL_LOGIN environment variable is required");
  if (!password) throw new Error("MAIL_PASSWORD environment variable is required");
  if (!smtpHost) throw new Error("SMTP_HOST environment variable is required");
  if (!imapHost) throw new Error("IMAP_HOST environment variable is required");

  return new MailClient({ login, password, smtpHost, imapHost });
}
