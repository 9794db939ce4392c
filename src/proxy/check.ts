import net from "node:net";
import { Impit } from "impit";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("check");

export const DEFAULT_ECHO_URLS: readonly string[] = [
  "http://ip-api.com/json/?fields=query",
  "https://api.ipify.org?format=json",
  "https://ifconfig.me/ip",
];

/**
 * Fetches the public IP as seen through `proxyServer`. Throws when no echo endpoint answers.
 * `timeoutMs` bounds the whole lookup, not each endpoint.
 */
export type EgressFetcher = (proxyServer: string, timeoutMs: number, signal?: AbortSignal) => Promise<string>;

export type ProxyTextFetch = (url: string, proxyUrl: string, timeoutMs: number, signal?: AbortSignal) => Promise<string>;

const LOCAL_IP_CACHE_TTL_MS = 10 * 60_000;
let cachedLocalIp: { value?: string; fetchedAtMs: number } = { value: undefined, fetchedAtMs: 0 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls an IP out of an echo body: JSON with `ip`, `query` or `origin`, or plain text.
 * Returns undefined unless the result is a valid IPv4/IPv6 address.
 */
export function normalizeIp(value: string | undefined): string | undefined {
  if (!value) return undefined;
  let text = value.trim();
  if (text.startsWith("{")) {
    try {
      const payload: unknown = JSON.parse(text);
      const candidate = isRecord(payload) ? (payload.ip ?? payload.query ?? payload.origin) : undefined;
      text = typeof candidate === "string" ? candidate : "";
    } catch (error) {
      log.debug(`echo body is not JSON: ${errorMessage(error)}`);
    }
  }
  // httpbin-style origins may list several hops
  const first = text.split(",")[0]?.trim().replace(/^\[|\]$/g, "") ?? "";
  if (net.isIP(first)) return first;
  const matchedV4 = first.match(/\b(?:\d{1,3}\.){3}\d{1,3}\b/);
  if (matchedV4?.[0] && net.isIPv4(matchedV4[0])) return matchedV4[0];
  return undefined;
}

async function fetchTextWithTimeout(url: string, timeoutMs: number, fetchImpl: typeof fetch): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1000, timeoutMs));
  try {
    const resp = await fetchImpl(url, { signal: controller.signal, headers: { Accept: "text/plain, application/json" } });
    if (!resp.ok) {
      throw new Error(`status_${resp.status}`);
    }
    return (await resp.text()).trim();
  } finally {
    clearTimeout(timer);
  }
}

/** Direct (unproxied) public IP, cached for ten minutes. */
export async function resolveLocalEgressIp(
  timeoutMs: number,
  options: { echoUrls?: readonly string[]; fetchImpl?: typeof fetch } = {},
): Promise<string | undefined> {
  const now = Date.now();
  if (cachedLocalIp.value && now - cachedLocalIp.fetchedAtMs <= LOCAL_IP_CACHE_TTL_MS) {
    return cachedLocalIp.value;
  }

  for (const url of options.echoUrls ?? DEFAULT_ECHO_URLS) {
    try {
      const ip = normalizeIp(await fetchTextWithTimeout(url, timeoutMs, options.fetchImpl ?? fetch));
      if (ip) {
        cachedLocalIp = { value: ip, fetchedAtMs: now };
        return ip;
      }
    } catch (error) {
      log.debug(`local ip via ${url} failed: ${errorMessage(error)}`);
    }
  }

  cachedLocalIp = { value: undefined, fetchedAtMs: now };
  return undefined;
}

export function resetLocalEgressIpCache(): void {
  cachedLocalIp = { value: undefined, fetchedAtMs: 0 };
}

// impit applies `timeout` to the whole request
const fetchViaProxy: ProxyTextFetch = async (url, proxyUrl, timeoutMs) => {
  const impit = new Impit({ proxyUrl, timeout: timeoutMs });
  const resp = await impit.fetch(url);
  if (!resp.ok) {
    throw new Error(`proxy_fetch_failed:${resp.status}`);
  }
  return await resp.text();
};

/**
 * Tries each echo URL through the proxy in order and returns the first IP found.
 * `fetchText` is the transport; by default an impit client bound to the proxy.
 */
export function createEgressFetcher(
  echoUrls: readonly string[] = DEFAULT_ECHO_URLS,
  fetchText: ProxyTextFetch = fetchViaProxy,
): EgressFetcher {
  return async (proxyServer, timeoutMs, signal) => {
    const deadline = Date.now() + timeoutMs;
    const failures: string[] = [];
    for (const url of echoUrls) {
      if (signal?.aborted) {
        failures.push(`aborted:${errorMessage(signal.reason)}`);
        break;
      }
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        failures.push(`budget_exhausted_${timeoutMs}ms`);
        break;
      }
      try {
        const ip = normalizeIp(await fetchText(url, proxyServer, remainingMs, signal));
        if (ip) return ip;
        failures.push(`${new URL(url).host}:no_ip`);
      } catch (error) {
        failures.push(`${new URL(url).host}:${errorMessage(error)}`);
      }
    }
    throw new Error(`egress_probe_failed:${failures.join(";") || "no_echo_urls"}`);
  };
}
