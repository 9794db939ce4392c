import { readFile } from "node:fs/promises";
import type {
  ControllerEndpoint,
  LaunchSpec,
  ProxyController,
  ProxyCoreProcess,
  ProxyCoreRuntime,
} from "../proxy/adapter.js";
import type { EgressFetcher } from "../proxy/check.js";
import { sleep } from "../utils/async.js";

export interface FakeCoreOptions {
  /** Egress IP per outbound name; outbounds not listed are unreachable. */
  egress?: Record<string, string>;
  /** Outbounds whose selection is never reflected by the controller. */
  stuck?: readonly string[];
  /** Exit with code 1 right after this many successful egress probes. */
  crashAfterProbes?: number;
  /** Exit with this code immediately after launch. */
  exitOnLaunch?: number;
  launchError?: Error;
  /** Failed `/version` polls before the controller answers. */
  notReadyPolls?: number;
  latencyMs?: number | null;
  /** How long the select call for an outbound takes; the selection lands only if it is not aborted first. */
  selectDelayMs?: Record<string, number>;
  /** How long each egress echo takes. */
  probeDelayMs?: number;
  onProbe?: (count: number) => void;
}

/**
 * In-process stand-in for a proxy core: one selectable group, a delay endpoint and an
 * egress echo. Every call takes at least a timer tick, stops early when its signal
 * aborts, and records an event so tests can assert ordering and that no two calls overlap.
 */
export class FakeCore implements ProxyCoreRuntime {
  readonly events: string[] = [];

  readonly launches: LaunchSpec[] = [];

  configText = "";

  endpoint: ControllerEndpoint | null = null;

  stopCalls = 0;

  maxInFlight = 0;

  private inFlight = 0;

  private selection: string | null = null;

  private probes = 0;

  private polls = 0;

  private exitProcess: ((code: number | null) => void) | null = null;

  private exited = false;

  private readonly options: FakeCoreOptions;

  constructor(options: FakeCoreOptions = {}) {
    this.options = options;
  }

  async launch(spec: LaunchSpec): Promise<ProxyCoreProcess> {
    if (this.options.launchError) throw this.options.launchError;
    this.launches.push(spec);
    this.configText = await readFile(spec.configPath, "utf8");
    const exitedPromise = new Promise<number | null>((resolve) => {
      this.exitProcess = (code) => {
        if (this.exited) return;
        this.exited = true;
        this.events.push(`exit:${code ?? "signal"}`);
        resolve(code);
      };
    });
    if (this.options.exitOnLaunch !== undefined) {
      this.exit(this.options.exitOnLaunch);
    }
    return {
      pid: 1234,
      exited: exitedPromise,
      hasExited: () => this.exited,
      logTail: () => "[stderr] fake core log",
      stop: async () => {
        this.stopCalls += 1;
        this.exit(null);
      },
    };
  }

  connect(endpoint: ControllerEndpoint): ProxyController {
    this.endpoint = endpoint;
    return {
      apiBaseUrl: endpoint.apiBaseUrl,
      proxyServer: endpoint.proxyServer,
      groupName: endpoint.groupName,
      version: () =>
        this.step("version", async () => {
          this.polls += 1;
          if (this.polls <= (this.options.notReadyPolls ?? 0)) throw new Error("connect ECONNREFUSED");
          return "fake-1.0";
        }),
      getGroupSelection: (signal) => this.step("now", async () => this.selection, 1, signal),
      setGroupProxy: (name, signal) =>
        this.step(
          `select:${name}`,
          async () => {
            if (!this.options.stuck?.includes(name)) this.selection = name;
          },
          this.options.selectDelayMs?.[name] ?? 1,
          signal,
        ),
      testDelay: (name, _url, _timeoutMs, signal) =>
        this.step(`delay:${name}`, async () => this.options.latencyMs ?? 42, 1, signal),
    };
  }

  readonly fetchEgress: EgressFetcher = (proxyServer, _timeoutMs, signal) =>
    this.step(
      "probe",
      async () => {
        if (this.exited) throw new Error("connect ECONNREFUSED");
        if (proxyServer !== this.endpoint?.proxyServer) throw new Error(`wrong proxy ${proxyServer}`);
        const ip = this.selection ? this.options.egress?.[this.selection] : undefined;
        if (!ip) throw new Error("proxy_fetch_failed:502");
        this.probes += 1;
        this.options.onProbe?.(this.probes);
        if (this.options.crashAfterProbes === this.probes) {
          setTimeout(() => this.exit(1), 0);
        }
        return ip;
      },
      this.options.probeDelayMs ?? 1,
      signal,
    );

  exit(code: number | null): void {
    this.exitProcess?.(code);
  }

  private async step<T>(label: string, action: () => Promise<T>, delayMs = 1, signal?: AbortSignal): Promise<T> {
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const event = label === "now" || label === "probe" ? `${label}:${this.selection ?? "-"}` : label;
    this.events.push(event);
    try {
      await sleep(delayMs, signal);
      return await action();
    } finally {
      this.inFlight -= 1;
    }
  }
}
