import { config as loadDotenv } from "dotenv";
import { readFile } from "node:fs/promises";
import process from "node:process";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./log.js";
import type { DetectionMode } from "./detect/engine.js";
import type { KeywordField } from "./detect/judge.js";
import type { SourceSpec } from "./nodes/source.js";
import { DEFAULT_ECHO_URLS } from "./proxy/check.js";

export const DEFAULT_CONFIG_PATH = "config.yaml";

export type Env = Readonly<Record<string, string | undefined>>;

export interface AppConfig {
  sources: SourceSpec[];
  filter: {
    nameBlacklist: string[];
    nameWhitelist: string[];
    mode: DetectionMode;
    /** False locates nodes (precise mode: probes them) without classifying. */
    classify: boolean;
    keepUnknown: boolean;
    /** Added to the keywords shipped with the ASN data. */
    extraKeywords: string[];
    keywordMatch: "substring" | "token";
    keywordFields: KeywordField[];
    asnDataPath: string | null;
  };
  detect: {
    dnsTimeoutMs: number;
    dnsConcurrency: number;
    geoBaseUrl: string;
    geoBatchSize: number;
    geoBatchIntervalMs: number;
    geoMaxRetries: number;
    geoTimeoutMs: number;
    abuseApiKey: string | null;
    abuseScoreThreshold: number;
    runTimeoutMs: number;
  };
  tester: {
    mihomoBin: string;
    checkUrl: string;
    echoUrls: string[];
    startupTimeoutMs: number;
    switchTimeoutMs: number;
    probeTimeoutMs: number;
    delayTimeoutMs: number;
    measureDelay: boolean;
    compareLocalIp: boolean;
  };
  output: {
    dir: string;
    configFile: string;
    proxiesFile: string;
    reportFile: string;
    mixedPort: number;
    apiPort: number;
  };
  remotePush: {
    enable: boolean;
    url: string | null;
    /** RELAY_TOKEN wins over `remote_push.token`. */
    token: string | null;
  };
  logLevel: LogLevel;
}

const positiveInt = z.number().int().positive();
const port = z.number().int().min(1).max(65535);

// A bare string is a subscription URL when it looks like one, a file path otherwise.
const sourceSchema = z.union([
  z.string().min(1).transform((value): SourceSpec => {
    const trimmed = value.trim();
    return /^https?:\/\//i.test(trimmed) ? { type: "subscription", url: trimmed } : { type: "file", path: trimmed };
  }),
  z
    .object({ type: z.literal("subscription"), url: z.string().url(), timeout_ms: positiveInt.optional() })
    .transform((value): SourceSpec => ({ type: "subscription", url: value.url, timeoutMs: value.timeout_ms })),
  z.object({ type: z.literal("file"), path: z.string().min(1) }),
]);

const fileSchema = z
  .object({
    sources: z.array(sourceSchema).default([]),
    filter: z
      .object({
        name_blacklist: z.array(z.string()).default([]),
        name_whitelist: z.array(z.string()).default([]),
        mode: z.enum(["fast", "precise"]).default("fast"),
        classify: z.boolean().default(true),
        keep_unknown: z.boolean().default(true),
        keywords: z.array(z.string()).default([]),
        keyword_match: z.enum(["substring", "token"]).default("substring"),
        keyword_fields: z.array(z.enum(["org", "isp", "as"])).nonempty().default(["org", "isp", "as"]),
        asn_data: z.string().min(1).optional(),
      })
      .default({}),
    detect: z
      .object({
        dns_timeout_ms: positiveInt.default(5_000),
        dns_concurrency: positiveInt.default(20),
        geo_base_url: z.string().url().default("http://ip-api.com"),
        geo_batch_size: z.number().int().min(1).max(100).default(100),
        geo_batch_interval_ms: z.number().int().min(0).default(4_000),
        geo_max_retries: z.number().int().min(0).default(3),
        geo_timeout_ms: positiveInt.default(15_000),
        abuse_score_threshold: z.number().min(0).max(100).default(25),
        run_timeout_ms: z.number().int().min(0).default(0),
      })
      .default({}),
    tester: z
      .object({
        mihomo_bin: z.string().min(1).default("mihomo"),
        check_url: z.string().url().default("https://www.gstatic.com/generate_204"),
        echo_urls: z.array(z.string().url()).nonempty().optional(),
        startup_timeout_ms: positiveInt.default(15_000),
        switch_timeout_ms: positiveInt.default(5_000),
        probe_timeout_ms: positiveInt.default(10_000),
        delay_timeout_ms: positiveInt.default(5_000),
        measure_delay: z.boolean().default(true),
        compare_local_ip: z.boolean().default(true),
      })
      .default({}),
    output: z
      .object({
        dir: z.string().min(1).default("output"),
        config_file: z.string().min(1).default("config.yaml"),
        proxies_file: z.string().min(1).default("proxies.yaml"),
        report_file: z.string().min(1).default("report.md"),
        mixed_port: port.default(7890),
        api_port: port.default(9090),
      })
      .default({}),
    remote_push: z
      .object({
        enable: z.boolean().default(false),
        url: z.string().url().optional(),
        token: z.string().trim().min(1).optional(),
      })
      .default({}),
  })
  .strict();

function envValue(env: Env, name: string): string | null {
  const value = (env[name] || "").trim();
  return value || null;
}

function describeIssue(issue: z.ZodIssue | undefined): string {
  if (!issue) return "unknown";
  return `${issue.path.join(".") || "(root)"} ${issue.message}`;
}

/** Validates a parsed YAML document and applies environment overrides. */
export function buildConfig(raw: unknown, env: Env = process.env, source = "config"): AppConfig {
  const parsed = fileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`invalid_config:${source}:${describeIssue(parsed.error.issues[0])}`);
  }
  const file = parsed.data;
  const remotePush = {
    enable: file.remote_push.enable,
    url: file.remote_push.url ?? null,
    token: envValue(env, "RELAY_TOKEN") ?? file.remote_push.token ?? null,
  };
  if (remotePush.enable && !remotePush.url) {
    throw new ConfigError(`invalid_config:${source}:remote_push.url is required when remote_push.enable is true`);
  }

  return {
    sources: file.sources,
    filter: {
      nameBlacklist: file.filter.name_blacklist,
      nameWhitelist: file.filter.name_whitelist,
      mode: file.filter.mode,
      classify: file.filter.classify,
      keepUnknown: file.filter.keep_unknown,
      extraKeywords: file.filter.keywords,
      keywordMatch: file.filter.keyword_match,
      keywordFields: file.filter.keyword_fields,
      asnDataPath: file.filter.asn_data ?? null,
    },
    detect: {
      dnsTimeoutMs: file.detect.dns_timeout_ms,
      dnsConcurrency: file.detect.dns_concurrency,
      geoBaseUrl: envValue(env, "IP_API_BASE_URL") ?? file.detect.geo_base_url,
      geoBatchSize: file.detect.geo_batch_size,
      geoBatchIntervalMs: file.detect.geo_batch_interval_ms,
      geoMaxRetries: file.detect.geo_max_retries,
      geoTimeoutMs: file.detect.geo_timeout_ms,
      abuseApiKey: envValue(env, "ABUSEIPDB_KEY"),
      abuseScoreThreshold: file.detect.abuse_score_threshold,
      runTimeoutMs: file.detect.run_timeout_ms,
    },
    tester: {
      mihomoBin: envValue(env, "MIHOMO_BIN") ?? file.tester.mihomo_bin,
      checkUrl: file.tester.check_url,
      echoUrls: file.tester.echo_urls ?? [...DEFAULT_ECHO_URLS],
      startupTimeoutMs: file.tester.startup_timeout_ms,
      switchTimeoutMs: file.tester.switch_timeout_ms,
      probeTimeoutMs: file.tester.probe_timeout_ms,
      delayTimeoutMs: file.tester.delay_timeout_ms,
      measureDelay: file.tester.measure_delay,
      compareLocalIp: file.tester.compare_local_ip,
    },
    output: {
      dir: file.output.dir,
      configFile: file.output.config_file,
      proxiesFile: file.output.proxies_file,
      reportFile: file.output.report_file,
      mixedPort: file.output.mixed_port,
      apiPort: file.output.api_port,
    },
    remotePush,
    logLevel: parseLogLevel(envValue(env, "LOG_LEVEL") ?? undefined, "info"),
  };
}

export function parseConfig(text: string, env: Env = process.env, source = "config"): AppConfig {
  let raw: unknown;
  try {
    raw = yamlParse(text);
  } catch (error) {
    throw new ConfigError(`invalid_config:${source}:${error instanceof Error ? error.message : String(error)}`);
  }
  return buildConfig(raw, env, source);
}

/**
 * Reads the YAML configuration. A missing file at the default path yields the
 * defaults; a missing file that was named explicitly is an error.
 */
export async function loadConfig(filePath: string | undefined, env: Env = process.env): Promise<AppConfig> {
  const target = filePath ?? DEFAULT_CONFIG_PATH;
  let text: string;
  try {
    text = await readFile(target, "utf8");
  } catch (error) {
    const missing = error instanceof Error && "code" in error && error.code === "ENOENT";
    if (missing && filePath === undefined) return buildConfig({}, env, target);
    throw new ConfigError(`config_unreadable:${target}:${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(text, env, target);
}

export function loadEnvFile(path = ".env.local"): void {
  loadDotenv({ path, quiet: true });
}
