import { afterEach, describe, expect, it, vi } from "vitest";
import { createEgressFetcher, normalizeIp, resetLocalEgressIpCache, resolveLocalEgressIp } from "./check.js";

describe("normalizeIp", () => {
  it("reads plain text and JSON echo bodies", () => {
    expect(normalizeIp("203.0.113.7\n")).toBe("203.0.113.7");
    expect(normalizeIp('{"ip":"198.51.100.4"}')).toBe("198.51.100.4");
    expect(normalizeIp('{"query":"2001:db8::5"}')).toBe("2001:db8::5");
    expect(normalizeIp('{"origin":"203.0.113.9, 10.0.0.1"}')).toBe("203.0.113.9");
  });

  it("finds an IPv4 address inside surrounding text", () => {
    expect(normalizeIp("Current IP: 192.0.2.33")).toBe("192.0.2.33");
  });

  it("rejects bodies without a valid address", () => {
    expect(normalizeIp(undefined)).toBeUndefined();
    expect(normalizeIp("<html>blocked</html>")).toBeUndefined();
    expect(normalizeIp("999.1.1.1")).toBeUndefined();
    expect(normalizeIp('{"status":"fail"}')).toBeUndefined();
  });
});

describe("createEgressFetcher", () => {
  it("falls through to the next echo URL", async () => {
    const fetchText = vi.fn(async (url: string, _proxyUrl: string, _timeoutMs: number) => {
      if (url.includes("first")) throw new Error("connect ECONNRESET");
      return "203.0.113.50";
    });
    const fetchEgress = createEgressFetcher(["https://first.example/ip", "https://second.example/ip"], fetchText);

    await expect(fetchEgress("http://127.0.0.1:7890", 5000)).resolves.toBe("203.0.113.50");
    expect(fetchText.mock.calls.map(([url, proxyUrl]) => [url, proxyUrl])).toEqual([
      ["https://first.example/ip", "http://127.0.0.1:7890"],
      ["https://second.example/ip", "http://127.0.0.1:7890"],
    ]);
  });

  it("reports every failure when no endpoint yields an IP", async () => {
    const fetchEgress = createEgressFetcher(["https://a.example/ip", "https://b.example/ip"], async (url) => {
      if (url.includes("a.example")) return "nothing here";
      throw new Error("timeout");
    });
    await expect(fetchEgress("http://127.0.0.1:7890", 5000)).rejects.toThrow(
      "egress_probe_failed:a.example:no_ip;b.example:timeout",
    );
  });

  it("shares one budget across endpoints and stops once aborted", async () => {
    const controller = new AbortController();
    const budgets: number[] = [];
    const fetchEgress = createEgressFetcher(
      ["https://a.example/ip", "https://b.example/ip", "https://c.example/ip"],
      async (_url, _proxyUrl, timeoutMs, signal) => {
        budgets.push(timeoutMs);
        expect(signal).toBe(controller.signal);
        controller.abort(new Error("step_timeout"));
        throw new Error("connect ECONNRESET");
      },
    );

    await expect(fetchEgress("http://127.0.0.1:7890", 3000, controller.signal)).rejects.toThrow(
      "egress_probe_failed:a.example:connect ECONNRESET;aborted:step_timeout",
    );
    expect(budgets).toHaveLength(1);
    expect(budgets[0]).toBeLessThanOrEqual(3000);
  });
});

describe("resolveLocalEgressIp", () => {
  afterEach(() => {
    resetLocalEgressIpCache();
  });

  it("caches the first address found", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("192.0.2.10"));
    expect(await resolveLocalEgressIp(1000, { echoUrls: ["https://echo.example/ip"], fetchImpl })).toBe("192.0.2.10");
    expect(await resolveLocalEgressIp(1000, { echoUrls: ["https://echo.example/ip"], fetchImpl })).toBe("192.0.2.10");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
