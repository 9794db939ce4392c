import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SourceFetchError } from "../errors.js";
import { loadSources, parseContent } from "./source.js";

const YAML_DOC = `
mixed-port: 7890
proxies:
  - name: hk-1
    type: ss
    server: 1.2.3.4
    port: 443
    cipher: aes-128-gcm
    password: 123456
  - name: broken
    type: vmess
    server: 5.6.7.8
    port: 80
  - name: unknown-kind
    type: snell
    server: 9.9.9.9
    port: 1
  - name: jp-1
    type: trojan
    server: jp.example.com
    port: "8443"
    password: test-secret
    sni: jp.example.com
`;

describe("parseContent", () => {
  it("reads a mihomo document and skips invalid or unsupported records", () => {
    const parsed = parseContent(YAML_DOC);
    expect(parsed.skipped).toBe(2);
    expect(parsed.nodes).toEqual([
      {
        type: "ss",
        name: "hk-1",
        server: "1.2.3.4",
        port: 443,
        params: { cipher: "aes-128-gcm", password: "123456" },
      },
      {
        type: "trojan",
        name: "jp-1",
        server: "jp.example.com",
        port: 8443,
        params: { password: "test-secret", sni: "jp.example.com" },
      },
    ]);
  });

  it("reads a JSON array of share links", () => {
    const parsed = parseContent(JSON.stringify(["trojan://test-secret@5.6.7.8:443#b"]));
    expect(parsed.nodes.map((node) => [node.type, node.server, node.port, node.name])).toEqual([
      ["trojan", "5.6.7.8", 443, "b"],
    ]);
  });

  it("decodes a base64 share-link bundle", () => {
    const bundle =
      "c3M6Ly9ZV1Z6TFRFeU9DMW5ZMjA2ZEdWemRDMXpaV055WlhRQDEuMi4zLjQ6ODM4OCNhCnRyb2phbjovL3Rlc3Qtc2VjcmV0QDUuNi43Ljg6NDQzI2IK";
    const parsed = parseContent(bundle);
    expect(parsed.nodes.map((node) => node.name)).toEqual(["a", "b"]);
    expect(parsed.nodes[0]?.params).toEqual({ cipher: "aes-128-gcm", password: "test-secret" });
  });

  it("reads plain share links line by line", () => {
    const parsed = parseContent("trojan://test-secret@a.example.com:443#one\nnot a link\nss://YWVzLTEyOC1nY206dGVzdC1zZWNyZXQ@1.2.3.4:8388#two\n");
    expect(parsed.nodes.map((node) => node.name)).toEqual(["one", "two"]);
    expect(parsed.skipped).toBe(1);
  });

  it("returns nothing for empty content", () => {
    expect(parseContent("  \n")).toEqual({ nodes: [], skipped: 0 });
  });
});

describe("loadSources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "source-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps going when one source fails and preserves source order", async () => {
    const filePath = path.join(dir, "nodes.yaml");
    await writeFile(filePath, YAML_DOC, "utf8");
    const fetchImpl = vi.fn<typeof fetch>(async (input) => {
      if (String(input).includes("bad")) {
        return new Response("nope", { status: 503 });
      }
      return new Response("trojan://test-secret@sub.example.com:443#from-sub", { status: 200 });
    });

    const loaded = await loadSources(
      [
        { type: "subscription", url: "https://sub.example.com/bad" },
        { type: "file", path: filePath },
        { type: "subscription", url: "https://sub.example.com/good" },
      ],
      { fetchImpl },
    );

    expect(loaded.nodes.map((node) => node.name)).toEqual(["hk-1", "jp-1", "from-sub"]);
    expect(loaded.errors).toHaveLength(1);
    expect(loaded.errors[0]).toBeInstanceOf(SourceFetchError);
    expect(loaded.errors[0]?.message).toBe("source_fetch_failed:status_503");
    expect(loaded.errors[0]?.source).toBe("https://sub.example.com/bad");
  });

  it("records a missing file as a source error", async () => {
    const loaded = await loadSources([{ type: "file", path: path.join(dir, "missing.yaml") }]);
    expect(loaded.nodes).toEqual([]);
    expect(loaded.errors[0]?.code).toBe("source_fetch_failed");
  });
});
