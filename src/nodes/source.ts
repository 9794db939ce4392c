import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as yamlParse } from "yaml";
import { SourceFetchError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { parseProxyRecord } from "./schema.js";
import { decodeBase64, looksLikeShareLink, parseShareLink } from "./share-links.js";
import type { ProxyNode } from "./types.js";

const log = createLogger("source");

export type SourceSpec =
  | { type: "subscription"; url: string; timeoutMs?: number }
  | { type: "file"; path: string };

export interface ParsedContent {
  nodes: ProxyNode[];
  skipped: number;
}

export interface LoadedSources {
  nodes: ProxyNode[];
  errors: SourceFetchError[];
}

export interface SourceLoaderOptions {
  fetchImpl?: typeof fetch;
  userAgent?: string;
  defaultTimeoutMs?: number;
}

function looksLikeBase64(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;
  return !/[^A-Za-z0-9+/=_\-\r\n]/.test(trimmed);
}

function fromRecords(records: unknown[]): ParsedContent {
  const nodes: ProxyNode[] = [];
  let skipped = 0;
  for (const record of records) {
    const parsed = parseProxyRecord(record);
    if (parsed.ok) {
      nodes.push(parsed.node);
    } else {
      skipped += 1;
      log.debug(`skip proxy record: ${parsed.reason}`);
    }
  }
  return { nodes, skipped };
}

function fromShareLinks(lines: string[]): ParsedContent {
  const records: unknown[] = [];
  let skipped = 0;
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const record = looksLikeShareLink(trimmed) ? parseShareLink(trimmed) : null;
    if (record) {
      records.push(record);
    } else {
      skipped += 1;
      log.debug(`skip share link: ${trimmed.slice(0, 30)}`);
    }
  }
  const parsed = fromRecords(records);
  return { nodes: parsed.nodes, skipped: parsed.skipped + skipped };
}

function fromDocument(document: unknown): ParsedContent | null {
  if (Array.isArray(document)) {
    if (document.length > 0 && document.every((item) => typeof item === "string")) {
      return fromShareLinks(document);
    }
    return fromRecords(document);
  }
  if (document && typeof document === "object" && "proxies" in document) {
    const proxies = document.proxies;
    return Array.isArray(proxies) ? fromRecords(proxies) : { nodes: [], skipped: 0 };
  }
  return null;
}

/**
 * Detects the format of a subscription body or node file: YAML/JSON documents with a
 * `proxies` list, bare lists, base64 share-link bundles and plain share links.
 */
export function parseContent(raw: string): ParsedContent {
  const text = raw.replace(/^\uFEFF/, "").trim();
  if (!text) return { nodes: [], skipped: 0 };

  if (looksLikeShareLink(text)) {
    return fromShareLinks(text.split(/\r?\n/));
  }

  let document: unknown;
  try {
    document = yamlParse(text);
  } catch (error) {
    log.debug(`content is not YAML/JSON: ${errorMessage(error)}`);
  }
  const fromDoc = fromDocument(document);
  if (fromDoc) return fromDoc;

  if (looksLikeBase64(text)) {
    const decoded = decodeBase64(text).trim();
    if (decoded.split(/\r?\n/).some((line) => looksLikeShareLink(line))) {
      return fromShareLinks(decoded.split(/\r?\n/));
    }
    if (/proxies:/i.test(decoded)) {
      return parseContent(decoded);
    }
  }

  log.warn("unrecognized content format");
  return { nodes: [], skipped: 0 };
}

async function fetchSubscription(
  url: string,
  timeoutMs: number,
  options: SourceLoaderOptions,
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1000, timeoutMs));
  try {
    const resp = await fetchImpl(url, {
      headers: { "User-Agent": options.userAgent || "clash.meta", Accept: "*/*" },
      signal: controller.signal,
    });
    if (!resp.ok) {
      throw new Error(`status_${resp.status}`);
    }
    return await resp.text();
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`timeout_${Math.max(1000, timeoutMs)}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

function expandHome(filePath: string): string {
  if (filePath === "~" || filePath.startsWith("~/")) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

function describeSource(source: SourceSpec): string {
  return source.type === "subscription" ? source.url.slice(0, 60) : source.path;
}

/** Loads every source in order; a failing source is recorded and skipped. */
export async function loadSources(
  sources: readonly SourceSpec[],
  options: SourceLoaderOptions = {},
): Promise<LoadedSources> {
  const nodes: ProxyNode[] = [];
  const errors: SourceFetchError[] = [];

  for (const source of sources) {
    const label = describeSource(source);
    try {
      let content: string;
      if (source.type === "subscription") {
        log.info(`fetching subscription ${label}`);
        content = await fetchSubscription(source.url, source.timeoutMs ?? options.defaultTimeoutMs ?? 30_000, options);
      } else {
        log.info(`reading file ${label}`);
        content = await readFile(expandHome(source.path), "utf8");
      }
      const parsed = parseContent(content);
      log.info(`${label}: ${parsed.nodes.length} nodes${parsed.skipped ? `, ${parsed.skipped} skipped` : ""}`);
      nodes.push(...parsed.nodes);
    } catch (error) {
      const failure = new SourceFetchError(label, errorMessage(error), { cause: error });
      log.error(`source failed ${failure.message}`);
      errors.push(failure);
    }
  }

  log.info(`loaded ${nodes.length} nodes from ${sources.length - errors.length}/${sources.length} sources`);
  return { nodes, errors };
}
