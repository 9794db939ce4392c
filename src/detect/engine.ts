import { DetectionError, RunCancelledError, type DetectionErrorCode, type SessionFatalError } from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { dedupeNodes } from "../nodes/dedup.js";
import { nodeKey, type NodeKey, type ProxyNode } from "../nodes/types.js";
import type { AbuseLookup } from "../proxy/abuse.js";
import type { GeoLookup, GeoRecord } from "../proxy/geo.js";
import type { AsnRegistry } from "./asn-registry.js";
import { judge, type AbuseSignal, type Classification, type JudgeRules, type KeywordRules } from "./judge.js";
import type { Resolution } from "./resolver.js";
import type { TesterRunResult } from "./tester.js";

const log = createLogger("engine");

export type DetectionMode = "fast" | "precise";

/** `unchecked` marks a node that was located but deliberately not classified. */
export type ResultLabel = Classification | "unchecked";

export interface DetectionFailure {
  code: DetectionErrorCode;
  message: string;
  fatal: boolean;
}

export interface DetectionResult {
  node: ProxyNode;
  mode: DetectionMode;
  /** Entry IP in fast mode, egress IP in precise mode. */
  ip: string | null;
  hosting: boolean | null;
  asn: string | null;
  asName: string | null;
  org: string | null;
  isp: string | null;
  countryCode: string | null;
  latencyMs: number | null;
  label: ResultLabel;
  reason: string;
  failure: DetectionFailure | null;
}

export interface DetectionSummary {
  total: number;
  datacenter: number;
  residential: number;
  unknown: number;
  unchecked: number;
  unknownTransient: number;
  unknownFatal: number;
}

export interface DetectionReport {
  mode: DetectionMode;
  /** One entry per distinct node, in input order. */
  results: Map<NodeKey, DetectionResult>;
  fatal: SessionFatalError | null;
  /** Distinct per-node and lookup errors followed by the fatal error, if any. */
  errors: DetectionError[];
  summary: DetectionSummary;
  durationMs: number;
}

export interface HostResolver {
  resolveAll(hosts: Iterable<string>, signal?: AbortSignal): Promise<Map<string, Resolution>>;
}

export interface IpClassifier {
  classifyIPs(ips: Iterable<string>, signal?: AbortSignal): Promise<Map<string, GeoLookup>>;
}

export interface AbuseChecker {
  checkAll(ips: Iterable<string>, signal?: AbortSignal): Promise<Map<string, AbuseLookup>>;
}

export interface EgressProber {
  run(nodes: readonly ProxyNode[], signal?: AbortSignal): Promise<TesterRunResult>;
}

export interface DetectOptions {
  signal?: AbortSignal;
  /**
   * When false, nodes are only located: fast mode skips resolution entirely, precise mode
   * still probes connectivity. Located nodes come back `unchecked`.
   */
  classify?: boolean;
}

export interface DetectionEngineOptions {
  registry: AsnRegistry;
  keywords: KeywordRules;
  abuseScoreThreshold?: number;
  resolver: HostResolver;
  geo: IpClassifier;
  abuse?: AbuseChecker | null;
  /** Required for precise mode. */
  tester?: EgressProber | null;
  /** Zero disables the run-level timeout. */
  runTimeoutMs?: number;
}

interface Located {
  node: ProxyNode;
  ip: string | null;
  latencyMs: number | null;
  error: DetectionError | null;
}

type ResultBase = Pick<DetectionResult, "node" | "mode" | "ip" | "latencyMs">;

export function summarize(results: Iterable<DetectionResult>): DetectionSummary {
  const summary: DetectionSummary = {
    total: 0,
    datacenter: 0,
    residential: 0,
    unknown: 0,
    unchecked: 0,
    unknownTransient: 0,
    unknownFatal: 0,
  };
  for (const result of results) {
    summary.total += 1;
    summary[result.label] += 1;
    if (result.label === "unknown") {
      if (result.failure?.fatal) summary.unknownFatal += 1;
      else summary.unknownTransient += 1;
    }
  }
  return summary;
}

function uncheckedResult(base: ResultBase): DetectionResult {
  return {
    ...base,
    hosting: null,
    asn: null,
    asName: null,
    org: null,
    isp: null,
    countryCode: null,
    label: "unchecked",
    reason: "detection disabled",
    failure: null,
  };
}

function unknownResult(base: ResultBase, error: DetectionError): DetectionResult {
  return {
    ...base,
    hosting: null,
    asn: null,
    asName: null,
    org: null,
    isp: null,
    countryCode: null,
    label: "unknown",
    reason: error.message,
    failure: { code: error.code, message: error.message, fatal: error.fatal },
  };
}

/**
 * Runs one detection pass in either mode. Per-node failures end up as `unknown`
 * results; only session-fatal conditions and cancellation are reported as `fatal`.
 */
export class DetectionEngine {
  private readonly options: DetectionEngineOptions;

  private readonly rules: JudgeRules;

  constructor(options: DetectionEngineOptions) {
    this.options = options;
    this.rules = {
      registry: options.registry,
      keywords: options.keywords,
      abuseScoreThreshold: options.abuseScoreThreshold ?? 25,
    };
  }

  async detect(input: readonly ProxyNode[], mode: DetectionMode, options: DetectOptions = {}): Promise<DetectionReport> {
    const startedAt = Date.now();
    const nodes = dedupeNodes(input);
    if (nodes.length < input.length) {
      log.info(`dropped ${input.length - nodes.length} duplicate nodes`);
    }
    if (mode === "precise" && !this.options.tester) {
      throw new Error("engine_misconfigured:precise mode needs a tester");
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener("abort", onAbort, { once: true });
    const runTimeoutMs = this.options.runTimeoutMs ?? 0;
    const timer =
      runTimeoutMs > 0 ? setTimeout(() => controller.abort(new Error(`run_timeout_${runTimeoutMs}ms`)), runTimeoutMs) : undefined;

    try {
      const signal = controller.signal;
      let cancelled: RunCancelledError | null = null;
      const cancellation = (): RunCancelledError => (cancelled ??= new RunCancelledError(errorMessage(signal.reason)));
      const classify = options.classify ?? true;
      let located: { items: Located[]; fatal: SessionFatalError | null };
      if (mode === "precise") located = await this.locateByEgress(nodes, signal);
      else if (classify) located = await this.locateByEntry(nodes, signal);
      else located = { items: nodes.map((node) => ({ node, ip: null, latencyMs: null, error: null })), fatal: null };

      const { results, lookupErrors } = classify
        ? await this.classify(located.items, mode, located.fatal, signal, cancellation)
        : { results: this.unclassified(located.items, mode, located.fatal, cancellation), lookupErrors: [] };
      const fatal = located.fatal ?? (signal.aborted ? cancellation() : null);
      const report = this.buildReport(mode, results, [...located.items.map((item) => item.error), ...lookupErrors], fatal, startedAt);
      log.info(
        classify
          ? `${mode} detection: ${report.summary.datacenter} datacenter, ${report.summary.residential} residential, ${report.summary.unknown} unknown in ${report.durationMs}ms`
          : `${mode} pass without detection: ${report.summary.unchecked} unchecked, ${report.summary.unknown} failed in ${report.durationMs}ms`,
      );
      return report;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private async locateByEntry(
    nodes: ProxyNode[],
    signal: AbortSignal,
  ): Promise<{ items: Located[]; fatal: SessionFatalError | null }> {
    const resolutions = await this.options.resolver.resolveAll(
      nodes.map((node) => node.server),
      signal,
    );
    const items = nodes.map((node): Located => {
      const resolution = resolutions.get(node.server);
      if (!resolution) return { node, ip: null, latencyMs: null, error: null };
      return resolution.ok
        ? { node, ip: resolution.ip, latencyMs: null, error: null }
        : { node, ip: null, latencyMs: null, error: resolution.error };
    });
    return { items, fatal: null };
  }

  private async locateByEgress(
    nodes: ProxyNode[],
    signal: AbortSignal,
  ): Promise<{ items: Located[]; fatal: SessionFatalError | null }> {
    if (!this.options.tester) return { items: [], fatal: null };
    const { probes, fatal } = await this.options.tester.run(nodes, signal);
    const items = nodes.map((node): Located => {
      const probe = probes.get(nodeKey(node));
      if (probe?.ok) return { node, ip: probe.egressIp, latencyMs: probe.latencyMs, error: null };
      return { node, ip: null, latencyMs: null, error: probe?.error ?? fatal };
    });
    return { items, fatal };
  }

  /** Fast mode keeps every node; precise mode keeps the ones whose probe succeeded. */
  private unclassified(
    items: Located[],
    mode: DetectionMode,
    fatal: SessionFatalError | null,
    cancellation: () => RunCancelledError,
  ): DetectionResult[] {
    return items.map((item) => {
      const base: ResultBase = { node: item.node, mode, ip: item.ip, latencyMs: item.latencyMs };
      if (mode === "fast" || item.ip) return uncheckedResult(base);
      return unknownResult(base, item.error ?? fatal ?? cancellation());
    });
  }

  /** Looks every distinct IP up once and applies the verdict to all nodes sharing it. */
  private async classify(
    items: Located[],
    mode: DetectionMode,
    fatal: SessionFatalError | null,
    signal: AbortSignal,
    cancellation: () => RunCancelledError,
  ): Promise<{ results: DetectionResult[]; lookupErrors: DetectionError[] }> {
    const ips = [...new Set(items.flatMap((item) => (item.ip ? [item.ip] : [])))];
    let geo = new Map<string, GeoLookup>();
    let abuse = new Map<string, AbuseLookup>();

    if (ips.length > 0 && !signal.aborted) {
      try {
        geo = await this.options.geo.classifyIPs(ips, signal);
        if (this.options.abuse) {
          abuse = await this.options.abuse.checkAll(
            ips.filter((ip) => geo.get(ip)?.ok),
            signal,
          );
        }
      } catch (error) {
        if (!signal.aborted) throw error;
        log.warn(`classification interrupted: ${errorMessage(signal.reason)}`);
      }
    }
    const lookupErrors = [...geo.values()].flatMap((lookup) => (lookup.ok ? [] : [lookup.error]));
    const results = items.map((item) => {
      const base: ResultBase = { node: item.node, mode, ip: item.ip, latencyMs: item.latencyMs };
      const lookup = item.ip ? geo.get(item.ip) : undefined;
      if (!item.ip || !lookup) {
        // no lookup for this node only happens once the run was interrupted
        return unknownResult(base, item.error ?? fatal ?? cancellation());
      }
      if (!lookup.ok) return unknownResult(base, lookup.error);
      const abuseLookup = abuse.get(lookup.record.ip);
      return this.judged(base, lookup.record, abuseLookup?.ok ? abuseLookup.signal : null);
    });
    return { results, lookupErrors };
  }

  private judged(base: ResultBase, record: GeoRecord, abuse: AbuseSignal | null): DetectionResult {
    const verdict = judge(
      {
        queried: true,
        hosting: record.hosting,
        asn: record.asn,
        org: record.org,
        isp: record.isp,
        asName: record.asName,
        abuse,
      },
      this.rules,
    );
    return {
      ...base,
      hosting: record.hosting,
      asn: record.asn,
      asName: record.asName,
      org: record.org,
      isp: record.isp,
      countryCode: record.countryCode,
      label: verdict.label,
      reason: verdict.reason,
      failure: null,
    };
  }

  private buildReport(
    mode: DetectionMode,
    list: DetectionResult[],
    nodeErrors: Array<DetectionError | null>,
    fatal: SessionFatalError | null,
    startedAt: number,
  ): DetectionReport {
    const results = new Map<NodeKey, DetectionResult>();
    for (const result of list) results.set(nodeKey(result.node), result);
    const errors = new Set<DetectionError>();
    for (const error of nodeErrors) {
      if (error && error !== fatal) errors.add(error);
    }
    if (fatal) errors.add(fatal);
    return { mode, results, fatal, errors: [...errors], summary: summarize(list), durationMs: Date.now() - startedAt };
  }
}
