/**
 * Multi-line stderr report for errors that escape the MCP handlers.
 */
export function formatError(label: string, err: unknown): string {
  const lines = [`[mail-relay-mcp] ${label}`];
  if (err instanceof Error) {
    lines.push(`  Message: ${err.message}`);
    lines.push(`  Name:    ${err.name}`);
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    if (code) lines.push(`  Code:    ${code}`);
    if (err.stack) lines.push(`  Stack:\n${err.stack}`);
  } else {
    lines.push(`  Value: ${JSON.stringify(err)}`);
  }
  lines.push(`  Time:  ${new Date().toISOString()}`);
  return lines.join("\n") + "\n";
}
