import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { filterHosts, loadHosts, sortHosts } from "../ssh/config/hosts.js";
import { loadConfig } from "../state/config.js";
import { getSshdeckDir } from "../state/paths.js";

type ToolResult = {
  ok: boolean;
  tool: string;
  error?: string;
  data?: unknown;
};

function respond(result: ToolResult) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
    structuredContent: result,
  };
}

export type SshdeckServerOptions = {
  /** Settings root; defaults to ~/.sshdeck (or SSHDECK_HOME). */
  baseDir?: string;
  /** Base directory for relative Include paths. */
  sshDir?: string;
};

export function createSshdeckServer(options: SshdeckServerOptions = {}) {
  const server = new McpServer({
    name: "sshdeck",
    version: "0.1.0",
  });

  server.registerTool(
    "list",
    {
      title: "List SSH Hosts",
      description:
        "Resolve the local ssh_config files into one row per distinct host configuration (name, aliases, user, destination, port, proxy command).",
      inputSchema: {
        search: z.string().optional(),
        configPaths: z.array(z.string().min(1)).optional(),
        strict: z.boolean().optional(),
      },
    },
    async ({ search, configPaths, strict }) => {
      try {
        // Re-read settings per call so edits to config.json apply without a restart.
        const cfg = loadConfig(options.baseDir ?? getSshdeckDir());
        const { hosts, skipped } = loadHosts({
          paths: configPaths ?? cfg.configPaths,
          optionalPaths: cfg.optionalPaths,
          strict: strict ?? cfg.strict,
          sshDir: options.sshDir,
        });
        const ordered = cfg.sortByName ? sortHosts(hosts) : hosts;
        return respond({
          ok: true,
          tool: "list",
          data: { hosts: filterHosts(ordered, search), skipped },
        });
      } catch (err) {
        return respond({
          ok: false,
          tool: "list",
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  );

  return server;
}
