import { describe, expect, it, vi } from "vitest";
import { QueryError } from "../errors.js";
import { GeoClassifier, parseIpApiEntry } from "./geo.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" }, ...init });
}

function successEntry(ip: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    status: "success",
    query: ip,
    country: "Japan",
    countryCode: "JP",
    regionName: "Tokyo",
    city: "Tokyo",
    isp: "Example ISP",
    org: "Example Org",
    as: "AS2516 KDDI CORPORATION",
    hosting: false,
    ...extra,
  };
}

function requestedIps(init: RequestInit | undefined): string[] {
  const parsed: unknown = JSON.parse(String(init?.body));
  return Array.isArray(parsed) ? parsed.map(String) : [];
}

describe("parseIpApiEntry", () => {
  it("extracts the ASN from the as field", () => {
    const parsed = parseIpApiEntry("1.2.3.4", successEntry("1.2.3.4", { as: "AS16509 Amazon.com, Inc.", hosting: true }));
    expect(parsed).toEqual({
      ok: true,
      record: {
        ip: "1.2.3.4",
        hosting: true,
        asn: "AS16509",
        asName: "AS16509 Amazon.com, Inc.",
        org: "Example Org",
        isp: "Example ISP",
        country: "Japan",
        countryCode: "JP",
        region: "Tokyo",
        city: "Tokyo",
      },
    });
  });

  it("turns a failed entry into a query error", () => {
    const parsed = parseIpApiEntry("10.0.0.1", { status: "fail", message: "private range", query: "10.0.0.1" });
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) expect(parsed.error.message).toBe("query_failed:10.0.0.1:status_fail:private range");
  });
});

describe("GeoClassifier", () => {
  it("deduplicates IPs and splits them into batches of at most 100", async () => {
    const ips = Array.from({ length: 150 }, (_, index) => `10.1.${Math.floor(index / 250)}.${index % 250}`);
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => jsonResponse(requestedIps(init).map((ip) => successEntry(ip))));
    const classifier = new GeoClassifier({ fetchImpl, batchIntervalMs: 0 });

    const results = await classifier.classifyIPs([...ips, ...ips.slice(0, 10)]);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl.mock.calls.map(([, init]) => requestedIps(init).length)).toEqual([100, 50]);
    expect(String(fetchImpl.mock.calls[0]?.[0])).toBe(
      "http://ip-api.com/batch?fields=status%2Cmessage%2Ccountry%2CcountryCode%2CregionName%2Ccity%2Cisp%2Corg%2Cas%2Chosting%2Cquery",
    );
    expect(results.size).toBe(150);
    expect([...results.values()].every((item) => item.ok)).toBe(true);
  });

  it("returns query errors for a batch that stays rate limited, without blocking other batches", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => {
      const ips = requestedIps(init);
      if (ips.includes("9.9.9.9")) {
        return new Response("", { status: 429, headers: { "X-Ttl": "7" } });
      }
      return jsonResponse(ips.map((ip) => successEntry(ip)));
    });
    const classifier = new GeoClassifier({ fetchImpl, sleep, batchSize: 1, batchIntervalMs: 0, maxRetries: 3 });

    const results = await classifier.classifyIPs(["9.9.9.9", "8.8.4.4"]);

    const limited = results.get("9.9.9.9");
    expect(limited?.ok).toBe(false);
    if (limited && !limited.ok) {
      expect(limited.error).toBeInstanceOf(QueryError);
      expect(limited.error.message).toBe("query_failed:9.9.9.9:rate_limited:retries_3");
    }
    expect(results.get("8.8.4.4")?.ok).toBe(true);
    // One initial attempt plus three retries, each retry waiting the X-Ttl seconds.
    expect(fetchImpl.mock.calls.filter(([, init]) => requestedIps(init).includes("9.9.9.9"))).toHaveLength(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([7000, 7000, 7000]);
  });

  it("backs off exponentially without an X-Ttl header and recovers", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    let calls = 0;
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => {
      calls += 1;
      if (calls <= 2) return new Response("", { status: 429 });
      return jsonResponse(requestedIps(init).map((ip) => successEntry(ip)));
    });
    const classifier = new GeoClassifier({ fetchImpl, sleep, batchIntervalMs: 0, backoffBaseMs: 100 });

    const results = await classifier.classifyIPs(["1.1.1.1"]);

    expect(results.get("1.1.1.1")?.ok).toBe(true);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("fails the whole batch on other HTTP errors and malformed bodies", async () => {
    const failing = new GeoClassifier({
      fetchImpl: async () => new Response("oops", { status: 500 }),
      batchIntervalMs: 0,
    });
    const failed = await failing.classifyIPs(["1.1.1.1", "2.2.2.2"]);
    expect([...failed.values()].map((item) => (item.ok ? "ok" : item.error.message))).toEqual([
      "query_failed:1.1.1.1:status_500",
      "query_failed:2.2.2.2:status_500",
    ]);

    const malformed = new GeoClassifier({ fetchImpl: async () => jsonResponse({ nope: true }), batchIntervalMs: 0 });
    const result = await malformed.classifyIPs(["1.1.1.1"]);
    const entry = result.get("1.1.1.1");
    expect(entry && !entry.ok ? entry.error.message : "").toBe("query_failed:1.1.1.1:malformed_body:not_an_array");
  });

  it("reports a failing entry for that IP only", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse([successEntry("1.1.1.1"), { status: "fail", message: "reserved range", query: "127.0.0.1" }]),
    );
    const classifier = new GeoClassifier({ fetchImpl, batchIntervalMs: 0 });
    const results = await classifier.classifyIPs(["1.1.1.1", "127.0.0.1", "3.3.3.3"]);

    expect(results.get("1.1.1.1")?.ok).toBe(true);
    const reserved = results.get("127.0.0.1");
    expect(reserved && !reserved.ok ? reserved.error.message : "").toBe("query_failed:127.0.0.1:status_fail:reserved range");
    const missing = results.get("3.3.3.3");
    expect(missing && !missing.ok ? missing.error.message : "").toBe("query_failed:3.3.3.3:missing_from_batch");
  });

  it("spaces batch requests by the configured interval", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => jsonResponse(requestedIps(init).map((ip) => successEntry(ip))));
    const classifier = new GeoClassifier({ fetchImpl, sleep, batchSize: 1, batchIntervalMs: 60_000, concurrency: 1 });

    await classifier.classifyIPs(["1.1.1.1", "2.2.2.2"]);

    expect(sleep).toHaveBeenCalledTimes(1);
    const waited = sleep.mock.calls[0]?.[0] ?? 0;
    expect(waited).toBeGreaterThan(59_000);
    expect(waited).toBeLessThanOrEqual(60_000);
  });
});
