import { spawn } from "node:child_process";
import { ProcessLaunchError, RunCancelledError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { nodeKey, toProxyRecord, type NodeKey, type ProxyNode } from "../nodes/types.js";
import { sleep } from "../utils/async.js";
import type { ControllerEndpoint, LaunchSpec, ProxyController, ProxyCoreProcess, ProxyCoreRuntime } from "./adapter.js";

const log = createLogger("mihomo");

/** Outbound names the core reserves for itself. */
export const RESERVED_OUTBOUNDS: readonly string[] = ["DIRECT", "REJECT", "REJECT-DROP", "GLOBAL", "PASS", "COMPATIBLE"];

export const DEFAULT_DNS: Readonly<Record<string, unknown>> = {
  enable: true,
  ipv6: false,
  "use-hosts": true,
  "default-nameserver": ["223.5.5.5", "1.1.1.1", "8.8.8.8"],
  nameserver: ["https://dns.alidns.com/dns-query", "https://cloudflare-dns.com/dns-query"],
  "proxy-server-nameserver": [
    "https://dns.alidns.com/dns-query#DIRECT",
    "https://doh.pub/dns-query#DIRECT",
    "1.1.1.1#DIRECT",
    "223.5.5.5#DIRECT",
  ],
};

export interface ProbeConfigInput {
  nodes: readonly ProxyNode[];
  mixedPort: number;
  apiPort: number;
  secret: string;
  groupName: string;
}

export interface ProbeConfig {
  config: Record<string, unknown>;
  outbounds: Map<NodeKey, string>;
}

/**
 * Gives every node an outbound name that is unique, non-empty and clear of the
 * reserved names (compared case-insensitively). Later duplicates get ` #2`, ` #3`, ...
 */
export function uniqueOutboundNames(nodes: readonly ProxyNode[], extraReserved: readonly string[] = []): string[] {
  const taken = new Set([...RESERVED_OUTBOUNDS, ...extraReserved].map((name) => name.toUpperCase()));
  return nodes.map((node) => {
    const base = node.name.trim() || `${node.type}-${node.server}:${node.port}`;
    let candidate = base;
    for (let suffix = 2; taken.has(candidate.toUpperCase()); suffix += 1) {
      candidate = `${base} #${suffix}`;
    }
    taken.add(candidate.toUpperCase());
    return candidate;
  });
}

export function buildProbeConfig(input: ProbeConfigInput): ProbeConfig {
  const names = uniqueOutboundNames(input.nodes, [input.groupName]);
  const outbounds = new Map<NodeKey, string>();
  const proxies = input.nodes.map((node, index) => {
    const name = names[index] ?? node.name;
    if (!outbounds.has(nodeKey(node))) outbounds.set(nodeKey(node), name);
    return toProxyRecord(node, name);
  });

  const config: Record<string, unknown> = {
    "mixed-port": input.mixedPort,
    "bind-address": "127.0.0.1",
    "allow-lan": false,
    "external-controller": `127.0.0.1:${input.apiPort}`,
    secret: input.secret,
    mode: "rule",
    "log-level": "warning",
    ipv6: true,
    dns: { ...DEFAULT_DNS },
    proxies,
    "proxy-groups": [{ name: input.groupName, type: "select", proxies: names }],
    rules: [`MATCH,${input.groupName}`],
  };
  return { config, outbounds };
}

interface HttpJsonOptions {
  body?: unknown;
  timeoutMs?: number;
  secret?: string;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
}

export async function httpJson(method: string, url: string, options: HttpJsonOptions = {}): Promise<unknown> {
  const timeoutMs = Math.max(1000, options.timeoutMs ?? 12_000);
  const headers: Record<string, string> = {};
  let payload: string | undefined;
  if (options.body !== undefined) {
    payload = JSON.stringify(options.body);
    headers["Content-Type"] = "application/json";
  }
  if (options.secret) {
    headers.Authorization = `Bearer ${options.secret}`;
  }
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const signal = options.signal ? AbortSignal.any([controller.signal, options.signal]) : controller.signal;
  try {
    const resp = await (options.fetchImpl ?? fetch)(url, { method, headers, body: payload, signal });
    const text = await resp.text();
    if (!resp.ok) {
      throw new Error(`mihomo_http_failed:${resp.status}:${text.slice(0, 200)}`);
    }
    if (!text) return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new Error(`mihomo_http_bad_json:${text.slice(0, 200)}`);
    }
  } catch (error) {
    if (options.signal?.aborted) {
      throw new Error(`mihomo_http_aborted:${errorMessage(options.signal.reason)}`, { cause: error });
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`mihomo_http_timeout:${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(payload: unknown, key: string): unknown {
  return isRecord(payload) ? payload[key] : undefined;
}

export function createMihomoController(endpoint: ControllerEndpoint, fetchImpl?: typeof fetch): ProxyController {
  const { apiBaseUrl, secret, groupName } = endpoint;
  const call = (
    method: string,
    pathname: string,
    options: { body?: unknown; timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<unknown> =>
    httpJson(method, `${apiBaseUrl}${pathname}`, { timeoutMs: 10_000, ...options, secret, fetchImpl });
  const groupPath = `/proxies/${encodeURIComponent(groupName)}`;

  return {
    apiBaseUrl,
    proxyServer: endpoint.proxyServer,
    groupName,
    version: async () => {
      const version = field(await call("GET", "/version", { timeoutMs: 3_000 }), "version");
      return typeof version === "string" ? version : "unknown";
    },
    getGroupSelection: async (signal) => {
      const now = field(await call("GET", groupPath, { signal }), "now");
      return typeof now === "string" ? now : null;
    },
    setGroupProxy: async (name, signal) => {
      await call("PUT", groupPath, { body: { name }, signal });
    },
    testDelay: async (name, url, timeoutMs, signal) => {
      const query = `url=${encodeURIComponent(url)}&timeout=${timeoutMs}`;
      try {
        const delay = field(
          await call("GET", `/proxies/${encodeURIComponent(name)}/delay?${query}`, {
            timeoutMs: Math.max(timeoutMs + 3_000, 8_000),
            signal,
          }),
          "delay",
        );
        return typeof delay === "number" && delay > 0 ? delay : null;
      } catch (error) {
        log.debug(`delay test failed for ${name}: ${errorMessage(error)}`);
        return null;
      }
    },
  };
}

/** Polls `/version` until the controller answers, the process exits, or the startup timeout passes. */
export async function waitForApi(
  controller: ProxyController,
  proc: ProxyCoreProcess,
  options: { timeoutMs?: number; intervalMs?: number; signal?: AbortSignal } = {},
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? 15_000;
  const intervalMs = options.intervalMs ?? 500;
  const start = Date.now();
  const withLogs = (detail: string): string => {
    const tail = proc.logTail();
    return tail ? `${detail} logs=${tail.slice(-1000)}` : detail;
  };
  while (Date.now() - start < timeoutMs) {
    if (options.signal?.aborted) {
      throw new RunCancelledError("startup");
    }
    if (proc.hasExited()) {
      throw new ProcessLaunchError(withLogs(`process_exited:${await proc.exited}`));
    }
    try {
      return await controller.version();
    } catch (error) {
      log.debug(`controller not ready: ${errorMessage(error)}`);
    }
    await sleep(intervalMs, options.signal).catch((error: unknown) => {
      throw options.signal?.aborted ? new RunCancelledError("startup") : error;
    });
  }
  throw new ProcessLaunchError(withLogs(`api_timeout_${timeoutMs}ms`));
}

export function spawnMihomo(binary: string, spec: LaunchSpec): ProxyCoreProcess {
  const logs: string[] = [];
  const appendLog = (source: string, text: string): void => {
    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line) continue;
      logs.push(`[${source}] ${line}`);
      if (logs.length > 240) {
        logs.splice(0, logs.length - 240);
      }
    }
  };

  const child = spawn(binary, ["-d", spec.workDir, "-f", spec.configPath], {
    stdio: ["ignore", "pipe", "pipe"],
  });
  child.stdout?.on("data", (chunk: Buffer) => appendLog("stdout", chunk.toString("utf8")));
  child.stderr?.on("data", (chunk: Buffer) => appendLog("stderr", chunk.toString("utf8")));

  let exited = false;
  const exitedPromise = new Promise<number | null>((resolve) => {
    child.once("exit", (code) => {
      exited = true;
      resolve(code);
    });
    child.once("error", (error) => {
      appendLog("spawn", error.message);
      exited = true;
      resolve(null);
    });
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      if (exited) return;
      child.kill("SIGTERM");
      const deadline = Date.now() + 5000;
      while (Date.now() < deadline) {
        if (exited) return;
        await sleep(200);
      }
      log.warn(`mihomo pid=${child.pid ?? "?"} ignored SIGTERM, sending SIGKILL`);
      child.kill("SIGKILL");
      await exitedPromise;
    })();
    return stopping;
  };

  return {
    pid: child.pid,
    exited: exitedPromise,
    hasExited: () => exited,
    logTail: () => logs.slice(-20).join(" | "),
    stop,
  };
}

export function createMihomoRuntime(binary: string, fetchImpl?: typeof fetch): ProxyCoreRuntime {
  return {
    launch: async (spec) => {
      log.info(`starting ${binary} -d ${spec.workDir}`);
      return spawnMihomo(binary, spec);
    },
    connect: (endpoint) => createMihomoController(endpoint, fetchImpl),
  };
}
