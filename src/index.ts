#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { runListCli } from "./cli/listCli.js";
import { createSshdeckServer } from "./mcp/server.js";

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === "serve") {
    // stdout is the MCP transport; nothing else may write to it.
    const server = createSshdeckServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    return;
  }

  runListCli(args[0] === "list" ? args.slice(1) : args);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`sshdeck failed: ${message}\n`);
  process.exitCode = 1;
});
