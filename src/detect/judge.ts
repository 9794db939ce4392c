import type { AsnRegistry } from "./asn-registry.js";

export type Classification = "datacenter" | "residential" | "unknown";

export type KeywordField = "org" | "isp" | "as";

export interface KeywordRules {
  keywords: readonly string[];
  match: "substring" | "token";
  fields: readonly KeywordField[];
}

export interface AbuseSignal {
  usageType: string | null;
  abuseScore: number;
  isTor: boolean;
}

/** What the judge sees for one IP. `queried: false` covers both a failed resolution and a failed query. */
export interface JudgeInput {
  queried: boolean;
  hosting: boolean | null;
  asn: string | null;
  org: string | null;
  isp: string | null;
  asName: string | null;
  abuse?: AbuseSignal | null;
}

export interface JudgeRules {
  registry: AsnRegistry;
  keywords: KeywordRules;
  abuseScoreThreshold: number;
}

export interface Verdict {
  label: Classification;
  reason: string;
}

export const DATACENTER_USAGE_TYPES: readonly string[] = [
  "data center/web hosting/transit",
  "hosting",
  "content delivery network",
];

export function normalizeText(value: string): string {
  return value.normalize("NFKC").toLowerCase();
}

function tokenize(value: string): string[] {
  return normalizeText(value)
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

function containsTokens(haystack: readonly string[], needle: readonly string[]): boolean {
  if (needle.length === 0) return false;
  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    if (needle.every((token, offset) => haystack[start + offset] === token)) return true;
  }
  return false;
}

/** Returns the first configured keyword found in the selected fields, or null. */
export function matchKeyword(input: Pick<JudgeInput, "org" | "isp" | "asName">, rules: KeywordRules): string | null {
  const values: Record<KeywordField, string | null> = { org: input.org, isp: input.isp, as: input.asName };
  const texts = rules.fields.map((field) => values[field]).filter((value): value is string => Boolean(value));
  if (texts.length === 0) return null;

  if (rules.match === "token") {
    const haystacks = texts.map(tokenize);
    for (const keyword of rules.keywords) {
      const needle = tokenize(keyword);
      if (haystacks.some((tokens) => containsTokens(tokens, needle))) return keyword;
    }
    return null;
  }

  const joined = texts.map(normalizeText);
  for (const keyword of rules.keywords) {
    const needle = normalizeText(keyword).trim();
    if (needle && joined.some((text) => text.includes(needle))) return keyword;
  }
  return null;
}

function abuseReason(abuse: AbuseSignal, threshold: number): string | null {
  if (abuse.usageType && DATACENTER_USAGE_TYPES.includes(abuse.usageType.trim().toLowerCase())) {
    return `abuse usage type: ${abuse.usageType}`;
  }
  if (abuse.isTor) return "abuse: tor exit";
  if (abuse.abuseScore >= threshold) return `abuse score ${abuse.abuseScore}`;
  return null;
}

/**
 * Fixed priority: unresolved, hosting flag, ASN registry, keywords, abuse signal, residential.
 */
export function judge(input: JudgeInput, rules: JudgeRules): Verdict {
  if (!input.queried) {
    return { label: "unknown", reason: "lookup failed" };
  }
  if (input.hosting === true) {
    return { label: "datacenter", reason: "hosting flag" };
  }
  if (input.asn && rules.registry.has(input.asn)) {
    const label = rules.registry.label(input.asn);
    return { label: "datacenter", reason: label ? `asn ${input.asn} (${label})` : `asn ${input.asn}` };
  }
  const keyword = matchKeyword(input, rules.keywords);
  if (keyword) {
    return { label: "datacenter", reason: `keyword: ${keyword}` };
  }
  if (input.abuse) {
    const reason = abuseReason(input.abuse, rules.abuseScoreThreshold);
    if (reason) return { label: "datacenter", reason };
  }
  return { label: "residential", reason: "no datacenter signal" };
}
