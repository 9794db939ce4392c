import { lookup as dnsLookup } from "node:dns/promises";
import net from "node:net";
import { ResolutionError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { mapWithConcurrency, withTimeout } from "../utils/async.js";

const log = createLogger("resolver");

export type LookupFn = (host: string) => Promise<string>;

export interface ResolverOptions {
  lookup?: LookupFn;
  timeoutMs?: number;
  concurrency?: number;
}

export type Resolution = { ok: true; ip: string } | { ok: false; error: ResolutionError };

const systemLookup: LookupFn = async (host) => {
  const result = await dnsLookup(host);
  return result.address;
};

/** Strips IPv6 brackets and returns the literal when `host` already is an IP. */
export function ipLiteral(host: string): string | null {
  const cleaned = host.trim().replace(/^\[(.*)\]$/, "$1");
  return net.isIP(cleaned) ? cleaned : null;
}

export class Resolver {
  private readonly lookup: LookupFn;

  private readonly timeoutMs: number;

  private readonly concurrency: number;

  constructor(options: ResolverOptions = {}) {
    this.lookup = options.lookup ?? systemLookup;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.concurrency = Math.max(1, options.concurrency ?? 20);
  }

  async resolve(host: string): Promise<Resolution> {
    const literal = ipLiteral(host);
    if (literal) return { ok: true, ip: literal };

    try {
      const address = await withTimeout(
        this.lookup(host),
        this.timeoutMs,
        () => new ResolutionError(host, `timeout_${this.timeoutMs}ms`),
      );
      const ip = ipLiteral(address);
      if (!ip) {
        return { ok: false, error: new ResolutionError(host, `invalid_address:${address}`) };
      }
      return { ok: true, ip };
    } catch (error) {
      if (error instanceof ResolutionError) return { ok: false, error };
      return { ok: false, error: new ResolutionError(host, errorMessage(error), { cause: error }) };
    }
  }

  /** Resolves each distinct host once; hosts still queued when `signal` aborts are left out of the map. */
  async resolveAll(hosts: Iterable<string>, signal?: AbortSignal): Promise<Map<string, Resolution>> {
    const unique = [...new Set(hosts)];
    const resolutions = await mapWithConcurrency(unique, this.concurrency, async (host) =>
      signal?.aborted ? null : await this.resolve(host),
    );
    const results = new Map<string, Resolution>();
    unique.forEach((host, index) => {
      const resolution = resolutions[index];
      if (resolution) results.set(host, resolution);
    });
    const resolved = resolutions.filter((item) => item?.ok).length;
    log.info(`resolved ${resolved}/${unique.length} servers`);
    return results;
  }
}
