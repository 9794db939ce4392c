import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export interface CliArgs {
  configPath?: string;
  subscriptions: string[];
  files: string[];
  outputDir?: string;
  precise: boolean;
  noDetect: boolean;
  mihomoBin?: string;
  verbose: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: node-filter [options]",
  "",
  "  -c, --config <path>        YAML configuration (default: config.yaml when present)",
  "  -s, --subscription <url>   subscription URL, repeatable; replaces configured sources",
  "  -f, --file <path>          local node file, repeatable; replaces configured sources",
  "  -o, --output-dir <dir>     where config.yaml, proxies.yaml and report.md are written",
  "      --precise, --test      classify by egress IP through mihomo instead of entry IP",
  "      --no-detect            skip classification: keep name-filtered nodes (precise: only alive ones)",
  "      --mihomo-bin <path>    mihomo binary for precise mode",
  "  -v, --verbose              debug logging",
  "  -h, --help                 show this help",
].join("\n");

const VALUE_FLAGS: Record<string, "configPath" | "subscriptions" | "files" | "outputDir" | "mihomoBin"> = {
  "-c": "configPath",
  "--config": "configPath",
  "-s": "subscriptions",
  "--subscription": "subscriptions",
  "-f": "files",
  "--file": "files",
  "-o": "outputDir",
  "--output-dir": "outputDir",
  "--mihomo-bin": "mihomoBin",
};

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { subscriptions: [], files: [], precise: false, noDetect: false, verbose: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    if (arg === "--precise" || arg === "--test") {
      args.precise = true;
      continue;
    }
    if (arg === "--no-detect") {
      args.noDetect = true;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      args.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      args.help = true;
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const target = VALUE_FLAGS[flag];
    if (!target) {
      throw new ConfigError(`unknown_argument:${arg}`);
    }
    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (!value?.trim()) {
      throw new ConfigError(`missing_value:${flag}`);
    }
    if (target === "subscriptions" || target === "files") {
      args[target].push(value.trim());
    } else {
      args[target] = value.trim();
    }
  }
  return args;
}

/** Command-line values win over the configuration file. */
export function applyArgs(config: AppConfig, args: CliArgs): AppConfig {
  const cliSources = [
    ...args.subscriptions.map((url) => ({ type: "subscription" as const, url })),
    ...args.files.map((path) => ({ type: "file" as const, path })),
  ];
  return {
    ...config,
    sources: cliSources.length > 0 ? cliSources : config.sources,
    filter: {
      ...config.filter,
      mode: args.precise ? "precise" : config.filter.mode,
      classify: args.noDetect ? false : config.filter.classify,
    },
    tester: { ...config.tester, mihomoBin: args.mihomoBin ?? config.tester.mihomoBin },
    output: { ...config.output, dir: args.outputDir ?? config.output.dir },
    logLevel: args.verbose ? "debug" : config.logLevel,
  };
}
