import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as yamlParse } from "yaml";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildConfig, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { runFilter } from "./pipeline.js";
import { FakeCore } from "./test/fake-core.js";

const NODES_YAML = [
  "proxies:",
  "  - { name: home, type: ss, server: home.example.com, port: 8388, cipher: aes-128-gcm, password: test-secret }",
  "  - { name: cloud, type: trojan, server: 203.0.113.10, port: 443, password: test-secret }",
  "  - { name: Expire 2026-12-31, type: trojan, server: 203.0.113.11, port: 443, password: test-secret }",
  "  - { name: home copy, type: ss, server: home.example.com, port: 8388, cipher: aes-128-gcm, password: test-secret }",
].join("\n");

const GEO: Record<string, Record<string, unknown>> = {
  "198.51.100.20": { org: "Chinanet Guangdong", isp: "Chinanet", as: "AS4134 CHINANET-BACKBONE", hosting: false },
  "203.0.113.10": { org: "Amazon.com, Inc.", isp: "Amazon.com", as: "AS16509 Amazon.com, Inc.", hosting: false },
};

function ipApiEntry(ip: string): Record<string, unknown> {
  const known = GEO[ip];
  if (!known) return { status: "fail", message: "reserved range", query: ip };
  return { status: "success", query: ip, country: "China", countryCode: "CN", regionName: "", city: "", ...known };
}

function fakeFetch(pushes: string[]) {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    if (url.includes("/batch")) {
      const parsed: unknown = JSON.parse(String(init?.body));
      const ips = Array.isArray(parsed) ? parsed.map(String) : [];
      return new Response(JSON.stringify(ips.map(ipApiEntry)), { status: 200 });
    }
    if (url === "https://sub.example.com/nodes") {
      return new Response("upstream unavailable", { status: 503 });
    }
    if (url === "https://relay.example.com/api/config" && init?.method === "PUT") {
      pushes.push(String(init.body));
      return new Response('{"ok":true}', { status: 200 });
    }
    return new Response("not found", { status: 404 });
  });
}

describe("runFilter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
    await writeFile(path.join(dir, "nodes.yaml"), NODES_YAML, "utf8");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(overrides: Record<string, unknown> = {}): AppConfig {
    return buildConfig(
      {
        sources: [{ type: "file", path: path.join(dir, "nodes.yaml") }],
        filter: { name_blacklist: ["expire"] },
        output: { dir: path.join(dir, "out") },
        remote_push: { enable: true, url: "https://relay.example.com" },
        ...overrides,
      },
      { RELAY_TOKEN: "test-token" },
    );
  }

  it("filters by name, classifies entry IPs, writes the outputs and pushes the config", async () => {
    const pushes: string[] = [];
    const fetchImpl = fakeFetch(pushes);

    const result = await runFilter(configFor(), {
      deps: { fetchImpl, lookup: async () => "198.51.100.20", sleep: async () => undefined },
    });

    expect(result.exitCode).toBe(0);
    expect(result.pushed).toBe(true);
    expect(result.report.summary).toEqual({ total: 2, datacenter: 1, residential: 1, unknown: 0, unchecked: 0, unknownTransient: 0, unknownFatal: 0 });
    const labels = [...result.report.results.values()].map((item) => [item.node.name, item.label]);
    expect(labels).toEqual([
      ["home", "residential"],
      ["cloud", "datacenter"],
    ]);
    expect(result.written.kept.map((item) => item.name)).toEqual(["home"]);
    expect(pushes).toEqual([result.written.configText]);
    const written: unknown = yamlParse(await readFile(path.join(dir, "out", "proxies.yaml"), "utf8"));
    expect(written).toMatchObject({ proxies: [{ name: "home", server: "home.example.com" }] });
    const report = await readFile(path.join(dir, "out", "report.md"), "utf8");
    expect(report.split("\n")).toContain("- Expire 2026-12-31 | - | - | - | reason: name blacklist");
    expect(report.split("\n")).toContain("- datacenter: 2 (name blacklist: 1)");
  });

  it("runs precise mode through the proxy core, exits 2 on a fatal session error and ships nothing", async () => {
    const core = new FakeCore({ exitOnLaunch: 1 });
    const pushes: string[] = [];

    const result = await runFilter(configFor({ filter: { mode: "precise" } }), {
      deps: { fetchImpl: fakeFetch(pushes), runtime: core, fetchEgress: core.fetchEgress, localIp: null },
    });

    expect(result.exitCode).toBe(2);
    expect(result.report.fatal?.code).toBe("process_launch_failed");
    expect(result.report.summary.unknownFatal).toBe(3);
    expect(result.written.kept).toEqual([]);
    expect(result.pushed).toBe(false);
    expect(pushes).toEqual([]);
  });

  it("fails without writing or pushing when no source yields a node", async () => {
    const pushes: string[] = [];
    const fetchImpl = fakeFetch(pushes);

    await expect(
      runFilter(configFor({ sources: ["https://sub.example.com/nodes"] }), {
        deps: { fetchImpl, lookup: async () => "198.51.100.20", sleep: async () => undefined },
      }),
    ).rejects.toThrow(/^no_nodes_loaded:/);

    expect(pushes).toEqual([]);
    expect(fetchImpl.mock.calls.map(([input]) => String(input))).toEqual(["https://sub.example.com/nodes"]);
    expect(await readdir(dir)).toEqual(["nodes.yaml"]);
  });

  it("keeps every name-filtered node without any lookups under --no-detect", async () => {
    const pushes: string[] = [];
    const fetchImpl = fakeFetch(pushes);
    const lookup = vi.fn(async (host: string) => `unexpected lookup of ${host}`);

    const result = await runFilter(configFor({ filter: { name_blacklist: ["expire"], classify: false } }), {
      deps: { fetchImpl, lookup },
    });

    expect(result.exitCode).toBe(0);
    expect(result.written.kept.map((item) => item.name)).toEqual(["home", "cloud"]);
    expect(result.report.summary.unchecked).toBe(2);
    expect(lookup).not.toHaveBeenCalled();
    expect(fetchImpl.mock.calls.map(([input]) => String(input))).toEqual(["https://relay.example.com/api/config"]);
    expect(pushes).toEqual([result.written.configText]);
  });

  it("keeps only live nodes under --no-detect in precise mode", async () => {
    const core = new FakeCore({ egress: { home: "198.51.100.20" } });
    const fetchImpl = fakeFetch([]);

    const result = await runFilter(
      configFor({ filter: { mode: "precise", classify: false }, remote_push: { enable: false } }),
      { deps: { fetchImpl, runtime: core, fetchEgress: core.fetchEgress, localIp: null } },
    );

    expect(result.exitCode).toBe(0);
    expect([...result.report.results.values()].map((item) => [item.node.name, item.label])).toEqual([
      ["home", "unchecked"],
      ["cloud", "unknown"],
      ["Expire 2026-12-31", "unknown"],
    ]);
    expect(result.written.kept.map((item) => item.name)).toEqual(["home"]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("classifies egress IPs in precise mode", async () => {
    const core = new FakeCore({ egress: { home: "198.51.100.20", cloud: "203.0.113.10", "Expire 2026-12-31": "198.51.100.20" } });

    const result = await runFilter(configFor({ filter: { mode: "precise" }, remote_push: { enable: false } }), {
      deps: { fetchImpl: fakeFetch([]), runtime: core, fetchEgress: core.fetchEgress, localIp: null, sleep: async () => undefined },
    });

    expect(result.exitCode).toBe(0);
    expect([...result.report.results.values()].map((item) => [item.node.name, item.ip, item.label, item.latencyMs])).toEqual([
      ["home", "198.51.100.20", "residential", 42],
      ["cloud", "203.0.113.10", "datacenter", 42],
      ["Expire 2026-12-31", "198.51.100.20", "residential", 42],
    ]);
  });

  it("refuses to run without sources", async () => {
    await expect(runFilter(buildConfig({}, {}))).rejects.toBeInstanceOf(ConfigError);
  });
});
