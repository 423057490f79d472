import type { SendMailOptions } from "nodemailer";
import MimeNode from "nodemailer/lib/mime-node/index.js";
import type { ParsedMail } from "mailparser";
import type { InboundMessage, OutgoingMessage } from "./types.js";

/**
 * Build the MIME tree for one outgoing message: a multipart/mixed root
 * carrying From, To (recipients joined with ", " in the given order) and
 * Subject, with a single text/plain child for the body.
 */
export function buildMimeMessage(
  sender: string,
  message: OutgoingMessage
): MimeNode {
  const root = new MimeNode("multipart/mixed");
  root.setHeader("From", sender);
  root.setHeader("To", message.recipients.join(", "));
  root.setHeader("Subject", message.subject);

  root.createChild("text/plain; charset=utf-8").setContent(message.body);
  return root;
}

/** Serialize a MIME tree to its RFC 5322 wire form. */
export function renderMimeMessage(node: MimeNode): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    node.build((err, buf) => {
      if (err) reject(err);
      else resolve(buf);
    });
  });
}

/**
 * nodemailer options submitting the pre-built message as-is.
 *
 * The SMTP envelope is set explicitly so every recipient gets a RCPT TO, even
 * an empty list (the server then decides what to do with it).
 */
export async function buildMailOptions(
  sender: string,
  message: OutgoingMessage
): Promise<SendMailOptions> {
  return {
    envelope: {
      from: sender,
      to: [...message.recipients],
    },
    raw: await renderMimeMessage(buildMimeMessage(sender, message)),
  };
}

function headerValueToString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((v) => headerValueToString(v)).join(", ");
  }
  if (value && typeof value === "object") {
    // Address headers (From, To, ...)
    if ("text" in value && typeof value.text === "string") return value.text;
    // Structured headers (Content-Type, ...)
    if ("value" in value && typeof value.value === "string") return value.value;
  }
  return String(value);
}

/**
 * Flatten a mailparser result into the plain {headers, body} shape.
 */
export function toInboundMessage(parsed: ParsedMail): InboundMessage {
  const headers: Record<string, string> = {};
  for (const [key, value] of parsed.headers) {
    headers[key] = headerValueToString(value);
  }

  return {
    headers,
    body: parsed.text ?? "",
  };
}
