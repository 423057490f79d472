#!/usr/bin/env node

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createClientFromEnv } from "./mail/index.js";
import { createServer } from "./server.js";
import { formatError } from "./report.js";

// stdout carries the MCP protocol, so everything else goes to stderr.
process.on("uncaughtException", (err) => {
  process.stderr.write(formatError("UNCAUGHT EXCEPTION", err));
});
process.on("unhandledRejection", (reason) => {
  process.stderr.write(formatError("UNHANDLED REJECTION", reason));
});

async function main() {
  const mailClient = createClientFromEnv();
  const server = createServer(mailClient);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // No connection to close: each tool call opens and closes its own.
  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(formatError("SHUTDOWN FAILED", error));
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
