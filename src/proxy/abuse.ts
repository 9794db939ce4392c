import { QueryError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import type { AbuseSignal } from "../detect/judge.js";
import { combineSignals, mapWithConcurrency } from "../utils/async.js";

const log = createLogger("abuse");

export type AbuseLookup = { ok: true; signal: AbuseSignal } | { ok: false; error: QueryError };

export interface AbuseClientOptions {
  apiKey: string;
  baseUrl?: string;
  maxAgeInDays?: number;
  timeoutMs?: number;
  concurrency?: number;
  fetchImpl?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseAbuseCheck(ip: string, payload: unknown): AbuseLookup {
  const data = isRecord(payload) ? payload.data : undefined;
  if (!isRecord(data)) {
    return { ok: false, error: new QueryError(ip, "malformed_body:missing_data") };
  }
  return {
    ok: true,
    signal: {
      usageType: typeof data.usageType === "string" && data.usageType.trim() ? data.usageType.trim() : null,
      abuseScore: typeof data.abuseConfidenceScore === "number" ? data.abuseConfidenceScore : 0,
      isTor: data.isTor === true,
    },
  };
}

/** AbuseIPDB `check` client. Only consulted when an API key is configured. */
export class AbuseClient {
  private readonly options: Required<Omit<AbuseClientOptions, "fetchImpl">> & { fetchImpl: typeof fetch };

  constructor(options: AbuseClientOptions) {
    this.options = {
      apiKey: options.apiKey,
      baseUrl: (options.baseUrl || "https://api.abuseipdb.com/api/v2").replace(/\/+$/, ""),
      maxAgeInDays: options.maxAgeInDays ?? 90,
      timeoutMs: options.timeoutMs ?? 10_000,
      concurrency: Math.max(1, options.concurrency ?? 5),
      fetchImpl: options.fetchImpl ?? fetch,
    };
  }

  async check(ip: string, signal?: AbortSignal): Promise<AbuseLookup> {
    const url = new URL(`${this.options.baseUrl}/check`);
    url.searchParams.set("ipAddress", ip);
    url.searchParams.set("maxAgeInDays", String(this.options.maxAgeInDays));
    try {
      const resp = await this.options.fetchImpl(url, {
        headers: { Key: this.options.apiKey, Accept: "application/json" },
        signal: combineSignals([signal, AbortSignal.timeout(this.options.timeoutMs)]),
      });
      if (!resp.ok) {
        return { ok: false, error: new QueryError(ip, `status_${resp.status}`) };
      }
      return parseAbuseCheck(ip, await resp.json());
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      return { ok: false, error: new QueryError(ip, errorMessage(error), { cause: error }) };
    }
  }

  async checkAll(ips: Iterable<string>, signal?: AbortSignal): Promise<Map<string, AbuseLookup>> {
    const unique = [...new Set(ips)];
    const lookups = await mapWithConcurrency(unique, this.options.concurrency, (ip) => this.check(ip, signal));
    const results = new Map<string, AbuseLookup>();
    unique.forEach((ip, index) => {
      const lookup = lookups[index];
      if (lookup) results.set(ip, lookup);
    });
    const ok = lookups.filter((item) => item.ok).length;
    log.info(`abuse check ${ok}/${unique.length} succeeded`);
    return results;
  }
}
