import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { stringify as yamlStringify } from "yaml";
import type { DetectionError } from "../errors.js";
import { createLogger } from "../log.js";
import { toProxyRecord, type ProxyNode } from "../nodes/types.js";
import type { DetectionReport, DetectionResult } from "../detect/engine.js";
import { DEFAULT_DNS, uniqueOutboundNames } from "../proxy/mihomo.js";

const log = createLogger("output");

export const SELECT_GROUP = "PROXY";
export const AUTO_GROUP = "AUTO";
export const DEFAULT_RULES: readonly string[] = ["GEOIP,LAN,DIRECT", "GEOIP,CN,DIRECT", `MATCH,${SELECT_GROUP}`];

export interface ConfigOptions {
  mixedPort: number;
  apiPort: number;
  testUrl?: string;
  now?: Date;
}

export interface ReportExtra {
  /** Nodes dropped by the name blacklist before detection. */
  nameFiltered?: readonly ProxyNode[];
  sourceErrors?: readonly DetectionError[];
  keepUnknown?: boolean;
  now?: Date;
}

export interface OutputFileNames {
  config: string;
  proxies: string;
  report: string;
}

export const DEFAULT_FILE_NAMES: OutputFileNames = {
  config: "config.yaml",
  proxies: "proxies.yaml",
  report: "report.md",
};

export interface WriteOutputsOptions extends ConfigOptions, ReportExtra {
  files?: Partial<OutputFileNames>;
}

export interface WrittenOutputs {
  kept: ProxyNode[];
  configPath: string;
  proxiesPath: string;
  reportPath: string;
  configText: string;
}

function header(count: number, now: Date): string {
  return [`# generated by residential-node-filter`, `# updated: ${now.toISOString()}`, `# nodes: ${count}`, ""].join("\n");
}

function proxyRecords(nodes: readonly ProxyNode[]): { names: string[]; records: Record<string, unknown>[] } {
  const names = uniqueOutboundNames(nodes, [SELECT_GROUP, AUTO_GROUP]);
  const records = nodes.map((node, index) => toProxyRecord(node, names[index] ?? node.name));
  return { names, records };
}

const RETAINABLE_FAILURES: ReadonlySet<string> = new Set(["resolution_failed", "query_failed"]);

/**
 * True for an unknown node that only missed a lookup (DNS or geo). Nodes that failed a
 * connectivity probe, or lost their result to a fatal error, are never retained.
 */
export function isRetainableUnknown(result: DetectionResult): boolean {
  return result.label === "unknown" && result.failure !== null && RETAINABLE_FAILURES.has(result.failure.code);
}

/**
 * Residential and unchecked nodes, plus unknown ones that only missed a lookup unless
 * `keepUnknown` is false, in input order.
 */
export function keptNodes(report: DetectionReport, keepUnknown = true): ProxyNode[] {
  return [...report.results.values()]
    .filter(
      (result) =>
        result.label === "residential" || result.label === "unchecked" || (keepUnknown && isRetainableUnknown(result)),
    )
    .map((result) => result.node);
}

export function buildFilteredConfig(nodes: readonly ProxyNode[], options: ConfigOptions): string {
  const { names, records } = proxyRecords(nodes);
  if (nodes.length === 0) log.warn("no nodes kept, writing an empty configuration");
  const config = {
    "mixed-port": options.mixedPort,
    "allow-lan": false,
    mode: "rule",
    "log-level": "info",
    ipv6: false,
    "external-controller": `127.0.0.1:${options.apiPort}`,
    dns: { ...DEFAULT_DNS },
    proxies: records,
    "proxy-groups": [
      { name: SELECT_GROUP, type: "select", proxies: [AUTO_GROUP, "DIRECT", ...names] },
      {
        name: AUTO_GROUP,
        type: "url-test",
        url: options.testUrl ?? "https://www.gstatic.com/generate_204",
        interval: 300,
        tolerance: 50,
        // an empty url-test group is rejected by the core
        proxies: names.length > 0 ? names : ["DIRECT"],
      },
    ],
    rules: [...DEFAULT_RULES],
  };
  return header(records.length, options.now ?? new Date()) + yamlStringify(config);
}

export function buildProxyList(nodes: readonly ProxyNode[], now: Date = new Date()): string {
  const { records } = proxyRecords(nodes);
  return header(records.length, now) + yamlStringify({ proxies: records });
}

function cell(value: string | number | null | undefined): string {
  return value === null || value === undefined || value === "" ? "-" : String(value);
}

function resultLine(result: DetectionResult): string {
  return [result.node.name, cell(result.ip), cell(result.org ?? result.isp), cell(result.countryCode)].join(" | ");
}

export function buildReport(report: DetectionReport, extra: ReportExtra = {}): string {
  const results = [...report.results.values()];
  const byLabel = (label: DetectionResult["label"]): DetectionResult[] => results.filter((result) => result.label === label);
  const residential = byLabel("residential");
  const datacenter = byLabel("datacenter");
  const unchecked = byLabel("unchecked");
  const unknown = byLabel("unknown");
  const nameFiltered = extra.nameFiltered ?? [];
  const keepUnknown = extra.keepUnknown ?? true;
  const { summary } = report;

  const lines = [
    "# Node filter report",
    "",
    `- generated: ${(extra.now ?? new Date()).toISOString()}`,
    `- mode: ${report.mode}`,
    `- duration: ${report.durationMs}ms`,
    "",
    "## Totals",
    `- residential: ${summary.residential}`,
    `- datacenter: ${summary.datacenter + nameFiltered.length} (name blacklist: ${nameFiltered.length})`,
    `- unknown: ${summary.unknown} (transient: ${summary.unknownTransient}, fatal: ${summary.unknownFatal})`,
  ];
  if (unchecked.length > 0) lines.push(`- not classified: ${summary.unchecked}`);

  if (residential.length > 0) {
    lines.push("", "## Residential (kept)");
    for (const result of residential) {
      lines.push(`- ${resultLine(result)}${result.latencyMs === null ? "" : ` | ${result.latencyMs}ms`}`);
    }
  }

  if (datacenter.length + nameFiltered.length > 0) {
    lines.push("", "## Datacenter (removed)");
    for (const result of datacenter) lines.push(`- ${resultLine(result)} | reason: ${result.reason}`);
    for (const node of nameFiltered) lines.push(`- ${node.name} | - | - | - | reason: name blacklist`);
  }

  if (unchecked.length > 0) {
    lines.push("", "## Not classified (kept)");
    for (const result of unchecked) lines.push(`- ${result.node.name} | ${cell(result.ip)}`);
  }

  const unknownLine = (result: DetectionResult): string =>
    `- ${result.node.name} | ${cell(result.ip)} | ${result.failure?.fatal ? "fatal" : "transient"}: ${result.reason}`;
  const retained = keepUnknown ? unknown.filter(isRetainableUnknown) : [];
  const dropped = unknown.filter((result) => !retained.includes(result));
  if (retained.length > 0) {
    lines.push("", "## Unknown (kept)");
    for (const result of retained) lines.push(unknownLine(result));
  }
  if (dropped.length > 0) {
    lines.push("", "## Unknown (removed)");
    for (const result of dropped) lines.push(unknownLine(result));
  }

  if (report.mode === "precise") {
    const alive = results.filter((result) => result.ip !== null);
    const dead = results.filter((result) => result.ip === null);
    lines.push("", "## Connectivity", `- alive: ${alive.length}`, `- failed: ${dead.length}`);
    if (alive.length > 0) {
      lines.push("", "### Alive");
      const sorted = [...alive].sort(
        (a, b) => (a.latencyMs ?? Number.POSITIVE_INFINITY) - (b.latencyMs ?? Number.POSITIVE_INFINITY),
      );
      for (const result of sorted) {
        lines.push(`- ${result.node.name} | ${cell(result.ip)} | ${result.latencyMs === null ? "-" : `${result.latencyMs}ms`}`);
      }
    }
    if (dead.length > 0) {
      lines.push("", "### Failed");
      for (const result of dead) lines.push(`- ${result.node.name} | ${result.failure?.message ?? result.reason}`);
    }
  }

  const errors = [...(extra.sourceErrors ?? []), ...report.errors];
  if (errors.length > 0) {
    lines.push("", "## Errors");
    for (const error of errors) lines.push(`- ${error.message}`);
  }

  return `${lines.join("\n")}\n`;
}

export async function writeOutputs(dir: string, report: DetectionReport, options: WriteOutputsOptions): Promise<WrittenOutputs> {
  const files = { ...DEFAULT_FILE_NAMES, ...options.files };
  const now = options.now ?? new Date();
  const kept = keptNodes(report, options.keepUnknown ?? true);
  const configText = buildFilteredConfig(kept, { ...options, now });

  await mkdir(dir, { recursive: true });
  const configPath = path.join(dir, files.config);
  const proxiesPath = path.join(dir, files.proxies);
  const reportPath = path.join(dir, files.report);
  await writeFile(configPath, configText, "utf8");
  await writeFile(proxiesPath, buildProxyList(kept, now), "utf8");
  await writeFile(reportPath, buildReport(report, { ...options, now }), "utf8");
  log.info(`wrote ${kept.length} nodes to ${configPath}, report at ${reportPath}`);
  return { kept, configPath, proxiesPath, reportPath, configText };
}
