import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger, errorMessage } from "./log.js";
import { loadAsnData } from "./detect/asn-registry.js";
import { DetectionEngine, type DetectionReport } from "./detect/engine.js";
import { Resolver, type LookupFn } from "./detect/resolver.js";
import { PreciseTester } from "./detect/tester.js";
import { filterByName } from "./nodes/name-filter.js";
import { loadSources } from "./nodes/source.js";
import { pushToRelay } from "./output/push.js";
import { writeOutputs, type WrittenOutputs } from "./output/writer.js";
import { AbuseClient } from "./proxy/abuse.js";
import type { ProxyCoreRuntime } from "./proxy/adapter.js";
import { createEgressFetcher, resolveLocalEgressIp, type EgressFetcher } from "./proxy/check.js";
import { GeoClassifier } from "./proxy/geo.js";
import { createMihomoRuntime } from "./proxy/mihomo.js";

const log = createLogger("pipeline");

/** Seams for the network, DNS and the proxy core; real implementations are used when omitted. */
export interface PipelineDeps {
  fetchImpl?: typeof fetch;
  lookup?: LookupFn;
  runtime?: ProxyCoreRuntime;
  fetchEgress?: EgressFetcher;
  /** Skips the direct egress lookup when set; `null` disables the comparison. */
  localIp?: string | null;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PipelineResult {
  exitCode: 0 | 2;
  report: DetectionReport;
  written: WrittenOutputs;
  pushed: boolean;
}

async function localIpFor(config: AppConfig, deps: PipelineDeps): Promise<string | null> {
  if (!config.tester.compareLocalIp) return null;
  if (deps.localIp !== undefined) return deps.localIp;
  const ip = await resolveLocalEgressIp(config.tester.probeTimeoutMs, {
    echoUrls: config.tester.echoUrls,
    fetchImpl: deps.fetchImpl,
  });
  if (!ip) log.warn("could not determine the direct egress IP; egress equal to it will not be flagged");
  return ip ?? null;
}

async function createEngine(config: AppConfig, deps: PipelineDeps): Promise<DetectionEngine> {
  const asnData = await loadAsnData(config.filter.asnDataPath ?? undefined);
  const tester =
    config.filter.mode === "precise"
      ? new PreciseTester({
          runtime: deps.runtime ?? createMihomoRuntime(config.tester.mihomoBin, deps.fetchImpl),
          fetchEgress: deps.fetchEgress ?? createEgressFetcher(config.tester.echoUrls),
          checkUrl: config.tester.checkUrl,
          startupTimeoutMs: config.tester.startupTimeoutMs,
          switchTimeoutMs: config.tester.switchTimeoutMs,
          probeTimeoutMs: config.tester.probeTimeoutMs,
          delayTimeoutMs: config.tester.delayTimeoutMs,
          measureDelay: config.tester.measureDelay,
          localIp: await localIpFor(config, deps),
        })
      : null;

  return new DetectionEngine({
    registry: asnData.registry,
    keywords: {
      keywords: [...asnData.keywords, ...config.filter.extraKeywords],
      match: config.filter.keywordMatch,
      fields: config.filter.keywordFields,
    },
    abuseScoreThreshold: config.detect.abuseScoreThreshold,
    resolver: new Resolver({
      lookup: deps.lookup,
      timeoutMs: config.detect.dnsTimeoutMs,
      concurrency: config.detect.dnsConcurrency,
    }),
    geo: new GeoClassifier({
      baseUrl: config.detect.geoBaseUrl,
      batchSize: config.detect.geoBatchSize,
      batchIntervalMs: config.detect.geoBatchIntervalMs,
      maxRetries: config.detect.geoMaxRetries,
      timeoutMs: config.detect.geoTimeoutMs,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
    }),
    abuse: config.detect.abuseApiKey ? new AbuseClient({ apiKey: config.detect.abuseApiKey, fetchImpl: deps.fetchImpl }) : null,
    tester,
    runTimeoutMs: config.detect.runTimeoutMs,
  });
}

/**
 * Load, name-filter, detect, write and optionally push. Outputs are written even
 * when the run ends with a fatal session error; the exit code reports it, and such
 * a run is never pushed. A run that loads no nodes at all throws before writing.
 */
export async function runFilter(config: AppConfig, options: { signal?: AbortSignal; deps?: PipelineDeps } = {}): Promise<PipelineResult> {
  const deps = options.deps ?? {};
  if (config.sources.length === 0) {
    throw new ConfigError("no_sources:configure sources or pass -s/--subscription or -f/--file");
  }

  const loaded = await loadSources(config.sources, { fetchImpl: deps.fetchImpl });
  if (loaded.nodes.length === 0) {
    const causes = loaded.errors.map((error) => `${error.source}=${error.message}`);
    throw new Error(`no_nodes_loaded:${causes.join(";") || "sources_empty"}`);
  }
  const engine = await createEngine(config, deps);
  const named = filterByName(loaded.nodes, {
    blacklist: config.filter.nameBlacklist,
    whitelist: config.filter.nameWhitelist,
  });
  if (named.removed.length > 0) {
    log.info(`name filter removed ${named.removed.length} of ${loaded.nodes.length} nodes`);
  }

  const report = await engine.detect(named.kept, config.filter.mode, {
    signal: options.signal,
    classify: config.filter.classify,
  });
  if (report.fatal) log.error(`detection ended early: ${report.fatal.message}`);

  const written = await writeOutputs(config.output.dir, report, {
    mixedPort: config.output.mixedPort,
    apiPort: config.output.apiPort,
    testUrl: config.tester.checkUrl,
    keepUnknown: config.filter.keepUnknown,
    nameFiltered: named.removed,
    sourceErrors: loaded.errors,
    files: {
      config: config.output.configFile,
      proxies: config.output.proxiesFile,
      report: config.output.reportFile,
    },
  });

  let pushed = false;
  if (config.remotePush.enable && config.remotePush.url) {
    if (report.fatal) {
      log.warn("relay push skipped: the run ended early");
    } else if (written.kept.length === 0) {
      log.warn("relay push skipped: no nodes kept");
    } else {
      try {
        await pushToRelay(written.configText, {
          url: config.remotePush.url,
          token: config.remotePush.token ?? undefined,
          fetchImpl: deps.fetchImpl,
        });
        pushed = true;
      } catch (error) {
        log.error(`relay push failed: ${errorMessage(error)}`);
      }
    }
  }

  return { exitCode: report.fatal ? 2 : 0, report, written, pushed };
}
