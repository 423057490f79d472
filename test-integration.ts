/**
 * Integration check against a real mail account: spawns the MCP server as a
 * child process, sends a message to the configured login over SMTP, then
 * reads it back over IMAP by its subject.
 *
 * Needs MAIL_LOGIN, MAIL_PASSWORD, SMTP_HOST and IMAP_HOST (see .env.example).
 */
import "dotenv/config";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";

function childEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

function firstText(result: Awaited<ReturnType<Client["callTool"]>>): string {
  const content = result.content;
  if (!Array.isArray(content)) return "";
  for (const item of content) {
    if (item && typeof item === "object" && "text" in item && typeof item.text === "string") {
      return item.text;
    }
  }
  return "";
}

const transport = new StdioClientTransport({
  command: "node",
  args: ["dist/index.js"],
  env: childEnv(),
});

const client = new Client({ name: "integration-test", version: "0.0.1" });
await client.connect(transport);

const login = process.env.MAIL_LOGIN ?? "";
const subject = `mail-relay-mcp check ${new Date().toISOString()}`;

try {
  console.log(`\n--- send_message to ${login} ---`);
  const sent = await client.callTool({
    name: "send_message",
    arguments: { subject, recipients: [login], body: "Integration check." },
  });
  console.log(firstText(sent));
  if (sent.isError) throw new Error("send_message failed");

  // Give the provider a moment to file the message in INBOX
  await new Promise((resolve) => setTimeout(resolve, 5000));

  console.log(`\n--- receive_message "${subject}" ---`);
  const received = await client.callTool({
    name: "receive_message",
    arguments: { subject },
  });
  console.log(firstText(received));
  if (received.isError) throw new Error("receive_message failed");
} catch (err) {
  console.error("\n!!! FAILED !!!", err);
  process.exitCode = 1;
} finally {
  await client.close();
}
