import { QueryError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { normalizeAsn } from "../detect/asn-registry.js";
import { combineSignals, mapWithConcurrency, sleep as defaultSleep } from "../utils/async.js";

const log = createLogger("geo");

export const IP_API_FIELDS = "status,message,country,countryCode,regionName,city,isp,org,as,hosting,query";

export interface GeoRecord {
  ip: string;
  hosting: boolean | null;
  asn: string | null;
  asName: string | null;
  org: string | null;
  isp: string | null;
  country: string | null;
  countryCode: string | null;
  region: string | null;
  city: string | null;
}

export type GeoLookup = { ok: true; record: GeoRecord } | { ok: false; error: QueryError };

export interface GeoClassifierOptions {
  baseUrl?: string;
  batchSize?: number;
  /** Minimum spacing between batch requests; the free tier allows 15 per minute. */
  batchIntervalMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  timeoutMs?: number;
  concurrency?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function parseIpApiEntry(ip: string, payload: Record<string, unknown>): GeoLookup {
  if (payload.status !== "success") {
    const message = optionalString(payload.message) ?? "unknown";
    return { ok: false, error: new QueryError(ip, `status_fail:${message}`) };
  }
  const asName = optionalString(payload.as);
  return {
    ok: true,
    record: {
      ip,
      hosting: typeof payload.hosting === "boolean" ? payload.hosting : null,
      asn: normalizeAsn(asName),
      asName,
      org: optionalString(payload.org),
      isp: optionalString(payload.isp),
      country: optionalString(payload.country),
      countryCode: optionalString(payload.countryCode),
      region: optionalString(payload.regionName),
      city: optionalString(payload.city),
    },
  };
}

function parseTtlMs(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

class RateLimitedError extends Error {
  readonly retryAfterMs: number | null;

  constructor(retryAfterMs: number | null) {
    super("status_429");
    this.retryAfterMs = retryAfterMs;
  }
}

/** Batch client for ip-api.com. Every IP asked for comes back as a record or a QueryError. */
export class GeoClassifier {
  private readonly baseUrl: string;

  private readonly batchSize: number;

  private readonly batchIntervalMs: number;

  private readonly maxRetries: number;

  private readonly backoffBaseMs: number;

  private readonly timeoutMs: number;

  private readonly concurrency: number;

  private readonly fetchImpl: typeof fetch;

  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private nextSlotAt = 0;

  constructor(options: GeoClassifierOptions = {}) {
    this.baseUrl = (options.baseUrl || "http://ip-api.com").replace(/\/+$/, "");
    this.batchSize = Math.min(100, Math.max(1, options.batchSize ?? 100));
    this.batchIntervalMs = Math.max(0, options.batchIntervalMs ?? 4_000);
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.backoffBaseMs = Math.max(0, options.backoffBaseMs ?? 2_000);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async classifyIPs(ips: Iterable<string>, signal?: AbortSignal): Promise<Map<string, GeoLookup>> {
    const unique = [...new Set(ips)];
    const batches: string[][] = [];
    for (let index = 0; index < unique.length; index += this.batchSize) {
      batches.push(unique.slice(index, index + this.batchSize));
    }

    const results = new Map<string, GeoLookup>();
    const perBatch = await mapWithConcurrency(batches, this.concurrency, (batch) => this.queryBatch(batch, signal));
    for (const batch of perBatch) {
      for (const [ip, lookup] of batch) results.set(ip, lookup);
    }
    const ok = [...results.values()].filter((item) => item.ok).length;
    if (unique.length > 0) {
      log.info(`classified ${ok}/${unique.length} IPs in ${batches.length} batch(es)`);
    }
    return results;
  }

  /** Reserves the next request slot so batch starts stay `batchIntervalMs` apart. */
  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const start = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = start + this.batchIntervalMs;
    if (start > now) {
      await this.sleep(start - now, signal);
    }
  }

  private async queryBatch(batch: string[], signal?: AbortSignal): Promise<Map<string, GeoLookup>> {
    const failAll = (detail: string, cause?: unknown): Map<string, GeoLookup> =>
      new Map(batch.map((ip) => [ip, { ok: false, error: new QueryError(ip, detail, { cause }) }]));

    for (let attempt = 0; ; attempt += 1) {
      await this.waitForSlot(signal);
      try {
        return await this.requestBatch(batch, signal);
      } catch (error) {
        if (signal?.aborted) throw signal.reason;
        if (!(error instanceof RateLimitedError)) {
          log.warn(`batch of ${batch.length} failed: ${errorMessage(error)}`);
          return failAll(errorMessage(error), error);
        }
        if (attempt >= this.maxRetries) {
          log.warn(`batch of ${batch.length} still rate limited after ${this.maxRetries} retries`);
          return failAll(`rate_limited:retries_${this.maxRetries}`, error);
        }
        const delay = error.retryAfterMs ?? this.backoffBaseMs * 2 ** attempt;
        log.warn(`rate limited, retrying in ${delay}ms (${attempt + 1}/${this.maxRetries})`);
        await this.sleep(delay, signal);
      }
    }
  }

  private async requestBatch(batch: string[], signal?: AbortSignal): Promise<Map<string, GeoLookup>> {
    const url = `${this.baseUrl}/batch?fields=${encodeURIComponent(IP_API_FIELDS)}`;
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(batch),
        signal: combineSignals([signal, AbortSignal.timeout(this.timeoutMs)]),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new Error(`timeout_${this.timeoutMs}ms`);
      }
      throw error;
    }

    if (resp.status === 429) {
      throw new RateLimitedError(parseTtlMs(resp.headers.get("X-Ttl")));
    }
    if (!resp.ok) {
      throw new Error(`status_${resp.status}`);
    }
    // X-Rl is the number of requests left in the current window.
    if (resp.headers.get("X-Rl") === "0") {
      const ttlMs = parseTtlMs(resp.headers.get("X-Ttl"));
      if (ttlMs !== null) this.nextSlotAt = Math.max(this.nextSlotAt, Date.now() + ttlMs);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await resp.text());
    } catch (error) {
      throw new Error(`malformed_body:${errorMessage(error)}`);
    }
    if (!Array.isArray(payload)) {
      throw new Error("malformed_body:not_an_array");
    }

    const byQuery = new Map<string, Record<string, unknown>>();
    payload.forEach((entry, index) => {
      if (!isRecord(entry)) return;
      const key = typeof entry.query === "string" ? entry.query : batch[index];
      if (key !== undefined && !byQuery.has(key)) byQuery.set(key, entry);
    });

    const results = new Map<string, GeoLookup>();
    for (const ip of batch) {
      const entry = byQuery.get(ip);
      results.set(ip, entry ? parseIpApiEntry(ip, entry) : { ok: false, error: new QueryError(ip, "missing_from_batch") });
    }
    return results;
  }
}
