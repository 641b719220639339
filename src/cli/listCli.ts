import { filterHosts, loadHosts, sortHosts, type ResolvedHost } from "../ssh/config/hosts.js";
import { loadConfig } from "../state/config.js";
import { getSshdeckDir } from "../state/paths.js";

export type ListArgs = {
  configPaths: string[];
  search?: string;
  strict?: boolean;
  sort?: boolean;
  json: boolean;
  showProxyCommand?: boolean;
  help: boolean;
};

export const LIST_USAGE = [
  "Usage: sshdeck [list] [options]",
  "       sshdeck serve",
  "",
  "Options:",
  "  -c, --config <path>     ssh_config file to read (repeatable)",
  "  -s, --search <text>     only show hosts matching <text>",
  "      --strict            fail on unknown directives",
  "      --no-sort           keep file order instead of sorting by name",
  "      --show-proxy-command",
  "                          add a PROXY COMMAND column",
  "      --json              print JSON instead of a table",
  "  -h, --help              show this help",
  "",
].join("\n");

export function parseListArgs(args: string[]): ListArgs {
  const out: ListArgs = { configPaths: [], json: false, help: false };

  const takeValue = (flag: string, i: number) => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith("-")) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-c":
      case "--config":
        out.configPaths.push(takeValue(arg, i));
        i++;
        break;
      case "-s":
      case "--search":
        out.search = takeValue(arg, i);
        i++;
        break;
      case "--strict":
        out.strict = true;
        break;
      case "--sort":
        out.sort = true;
        break;
      case "--no-sort":
        out.sort = false;
        break;
      case "--json":
        out.json = true;
        break;
      case "--show-proxy-command":
        out.showProxyCommand = true;
        break;
      case "-h":
      case "--help":
        out.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return out;
}

type Column = {
  title: string;
  value: (host: ResolvedHost) => string;
};

export function formatHostTable(hosts: readonly ResolvedHost[], showProxyCommand = false) {
  const columns: Column[] = [
    { title: "NAME", value: (h) => h.name },
    { title: "ALIASES", value: (h) => h.aliases },
    { title: "USER", value: (h) => h.user ?? "" },
    { title: "DESTINATION", value: (h) => h.destination },
    { title: "PORT", value: (h) => h.port ?? "" },
  ];
  if (showProxyCommand) {
    columns.push({ title: "PROXY COMMAND", value: (h) => h.proxyCommand ?? "" });
  }

  const rows = [columns.map((c) => c.title), ...hosts.map((h) => columns.map((c) => c.value(h)))];
  const widths = columns.map((_, i) => Math.max(...rows.map((r) => r[i].length)));

  return rows.map((r) => r.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd()).join("\n") + "\n";
}

export function runListCli(argv: string[]) {
  const args = parseListArgs(argv);
  if (args.help) {
    process.stdout.write(LIST_USAGE);
    return;
  }

  const cfg = loadConfig(getSshdeckDir());
  const { hosts, skipped } = loadHosts({
    paths: args.configPaths.length ? args.configPaths : cfg.configPaths,
    optionalPaths: cfg.optionalPaths,
    strict: args.strict ?? cfg.strict,
  });

  for (const p of skipped) {
    process.stderr.write(`Skipping missing ${p}\n`);
  }

  const ordered = (args.sort ?? cfg.sortByName) ? sortHosts(hosts) : hosts;
  const shown = filterHosts(ordered, args.search);

  if (args.json) {
    process.stdout.write(JSON.stringify(shown, null, 2) + "\n");
    return;
  }
  process.stdout.write(formatHostTable(shown, args.showProxyCommand ?? cfg.showProxyCommand));
}
