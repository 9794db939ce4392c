import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { createLogger } from "../log.js";

const log = createLogger("asn");

export const DEFAULT_ASN_DATA_PATH = fileURLToPath(new URL("../../data/datacenter_asn.yaml", import.meta.url));

export interface AsnEntry {
  readonly asn: string;
  readonly label: string;
}

/**
 * Normalizes `16509`, `"16509"`, `"as16509"` and `"AS16509 Amazon.com, Inc."` to `AS16509`.
 * Returns null for anything without a leading AS number.
 */
export function normalizeAsn(raw: unknown): string | null {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? `AS${raw}` : null;
  }
  if (typeof raw !== "string") return null;
  const match = raw.trim().match(/^(?:AS)?(\d+)\b/i);
  if (!match?.[1]) return null;
  const value = Number.parseInt(match[1], 10);
  return value > 0 ? `AS${value}` : null;
}

/** Read-only set of hosting-provider ASNs, built once per run. */
export class AsnRegistry {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Iterable<AsnEntry>) {
    const map = new Map<string, string>();
    for (const entry of entries) {
      const asn = normalizeAsn(entry.asn);
      if (!asn) {
        log.warn(`ignoring malformed ASN entry ${JSON.stringify(entry.asn)}`);
        continue;
      }
      if (!map.has(asn)) map.set(asn, entry.label);
    }
    this.entries = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  has(asn: string | null | undefined): boolean {
    const normalized = normalizeAsn(asn);
    return normalized !== null && this.entries.has(normalized);
  }

  label(asn: string | null | undefined): string | undefined {
    const normalized = normalizeAsn(asn);
    return normalized === null ? undefined : this.entries.get(normalized);
  }
}

const asnValue = z.union([z.string(), z.number()]).transform((value) => String(value));

// Either a list of `{ asn, label }` or a plain `AS16509: Amazon` mapping.
const asnDataSchema = z.object({
  datacenter_asns: z
    .union([
      z.array(z.object({ asn: asnValue, label: z.string().default("") })),
      z.record(z.string(), z.string().nullable()).transform((record) =>
        Object.entries(record).map(([asn, label]) => ({ asn, label: label ?? "" })),
      ),
    ])
    .default([]),
  datacenter_keywords: z.array(z.string()).default([]),
});

export interface AsnData {
  registry: AsnRegistry;
  keywords: readonly string[];
}

export function parseAsnData(text: string, source = "asn data"): AsnData {
  const parsed = asnDataSchema.safeParse(yamlParse(text) ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`invalid_asn_data:${source}:${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  const keywords = parsed.data.datacenter_keywords.map((keyword) => keyword.trim()).filter(Boolean);
  return { registry: new AsnRegistry(parsed.data.datacenter_asns), keywords: Object.freeze(keywords) };
}

export async function loadAsnData(filePath: string = DEFAULT_ASN_DATA_PATH): Promise<AsnData> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`asn_data_unreadable:${filePath}:${error instanceof Error ? error.message : String(error)}`);
  }
  const data = parseAsnData(text, filePath);
  log.info(`loaded ${data.registry.size} datacenter ASNs and ${data.keywords.length} keywords`);
  return data;
}
