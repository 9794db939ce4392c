import { describe, expect, it } from "vitest";
import { dedupeNodes } from "./dedup.js";
import type { ProxyNode } from "./types.js";

const ss = (server: string, port: number, name: string): ProxyNode => ({
  type: "ss",
  server,
  port,
  name,
  params: { cipher: "aes-128-gcm", password: "test-secret" },
});

const vmess = (server: string, port: number, name: string): ProxyNode => ({
  type: "vmess",
  server,
  port,
  name,
  params: { uuid: "00000000-0000-0000-0000-000000000001" },
});

describe("dedupeNodes", () => {
  it("keeps the first node per (type, server, port)", () => {
    const nodes = [ss("1.2.3.4", 443, "n1"), ss("1.2.3.4", 443, "n2"), vmess("5.6.7.8", 80, "n3")];
    expect(dedupeNodes(nodes).map((node) => node.name)).toEqual(["n1", "n3"]);
  });

  it("treats a different type on the same endpoint as a distinct node", () => {
    const nodes = [ss("1.2.3.4", 443, "a"), vmess("1.2.3.4", 443, "b"), ss("1.2.3.4", 8443, "c")];
    expect(dedupeNodes(nodes).map((node) => node.name)).toEqual(["a", "b", "c"]);
  });

  it("is idempotent", () => {
    const nodes = [ss("h1", 1, "a"), ss("h2", 2, "b"), ss("h1", 1, "c"), vmess("h2", 2, "d"), ss("h2", 2, "e")];
    const once = dedupeNodes(nodes);
    expect(dedupeNodes(once)).toEqual(once);
    expect(once.map((node) => node.name)).toEqual(["a", "b", "d"]);
  });
});
