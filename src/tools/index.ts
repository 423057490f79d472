/**
 * MCP tool definitions for the mail client.
 *
 * Each tool co-locates its schema and handler in a single registration
 * object; dispatch is a map lookup over the registry.
 */

import type { MailClient } from "../mail/index.js";
import {
  IMAP_TLS_PORT,
  SMTP_SUBMISSION_PORT,
  describeMailError,
} from "../mail/index.js";

// ---------------------------------------------------------------------------
// Tool registry types and helpers
// ---------------------------------------------------------------------------

interface ToolResult {
  content: { type: "text"; text: string }[];
  isError?: true;
  [key: string]: unknown;
}

interface ToolRegistration {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: readonly string[];
  };
  handler: (
    mailClient: MailClient,
    args: Record<string, unknown>
  ) => Promise<ToolResult>;
}

function jsonResult(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function errorResult(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function stringListArg(
  args: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = args[key];
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((v): v is string => typeof v === "string");
  return items.length === value.length ? items : undefined;
}

// ---------------------------------------------------------------------------
// Tool registry
// ---------------------------------------------------------------------------

const registry: ToolRegistration[] = [
  {
    name: "send_message",
    description:
      "Send a plain-text email from the configured account over SMTP. " +
      "All recipients go in the To header, in the given order. " +
      "Returns {sent: true, subject, recipients}.",
    inputSchema: {
      type: "object",
      properties: {
        subject: {
          type: "string",
          description: "Email subject line.",
        },
        recipients: {
          type: "array",
          items: { type: "string" },
          description: 'Recipient addresses (e.g. ["alice@example.com"]).',
        },
        body: {
          type: "string",
          description: "Plain text email body.",
        },
      },
      required: ["subject", "recipients", "body"],
    },
    handler: async (mailClient, args) => {
      const subject = stringArg(args, "subject");
      const recipients = stringListArg(args, "recipients");
      const body = stringArg(args, "body");

      if (subject === undefined || recipients === undefined || body === undefined)
        return errorResult(
          "Error: subject, recipients (array of strings), and body are required."
        );

      try {
        await mailClient.sendMessage(subject, recipients, body);
      } catch (error) {
        return errorResult(
          describeMailError(error, "SMTP", mailClient.smtpHost, SMTP_SUBMISSION_PORT)
        );
      }
      return jsonResult({ sent: true, subject, recipients });
    },
  },

  {
    name: "receive_message",
    description:
      "Fetch the most recent email in INBOX over IMAP. " +
      "If subject is given, only messages whose Subject header contains it are considered. " +
      "Returns {headers, body}; header names are lower-case.",
    inputSchema: {
      type: "object",
      properties: {
        subject: {
          type: "string",
          description: "Optional Subject header to search for.",
        },
      },
    },
    handler: async (mailClient, args) => {
      const subject = stringArg(args, "subject") || undefined;

      try {
        const message = await mailClient.receiveMessage(subject);
        return jsonResult(message);
      } catch (error) {
        return errorResult(
          describeMailError(error, "IMAP", mailClient.imapHost, IMAP_TLS_PORT)
        );
      }
    },
  },
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Tool schemas for MCP ListTools response. */
export const tools = registry.map(({ name, description, inputSchema }) => ({
  name,
  description,
  inputSchema,
}));

const handlerMap = new Map(registry.map((t) => [t.name, t.handler]));

export async function handleToolCall(
  mailClient: MailClient,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const handler = handlerMap.get(name);
  if (!handler) return errorResult(`Unknown tool: ${name}`);
  return handler(mailClient, args);
}
