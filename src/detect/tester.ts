import { randomBytes } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { stringify as yamlStringify } from "yaml";
import {
  DetectionError,
  ProcessCrashError,
  ProcessLaunchError,
  RunCancelledError,
  SwitchTimeoutError,
  UnreachableError,
  type SessionFatalError,
} from "../errors.js";
import { createLogger, errorMessage } from "../log.js";
import { dedupeNodes } from "../nodes/dedup.js";
import { nodeKey, type NodeKey, type ProxyNode } from "../nodes/types.js";
import type { ProxyController, ProxyCoreProcess, ProxyCoreRuntime } from "../proxy/adapter.js";
import { createEgressFetcher, type EgressFetcher } from "../proxy/check.js";
import { buildProbeConfig, waitForApi } from "../proxy/mihomo.js";
import { sleep, withDeadline } from "../utils/async.js";

const log = createLogger("tester");

export type SessionState =
  | "Init"
  | "ConfigGenerated"
  | "ProcessStarted"
  | "ApiReady"
  | "Switching"
  | "Probing"
  | "Stopped"
  | "Failed";

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Init: ["ConfigGenerated", "Stopped", "Failed"],
  ConfigGenerated: ["ProcessStarted", "Failed"],
  ProcessStarted: ["ApiReady", "Failed"],
  ApiReady: ["Switching", "Stopped", "Failed"],
  Switching: ["Probing", "Switching", "Stopped", "Failed"],
  Probing: ["Switching", "Stopped", "Failed"],
  Stopped: [],
  Failed: [],
};

/**
 * Lifecycle of the single proxy-core instance of a precise run. The active outbound
 * is only set once the control API has confirmed the switch.
 */
export class TesterSession {
  private current: SessionState = "Init";

  private active: string | null = null;

  readonly history: SessionState[] = ["Init"];

  get state(): SessionState {
    return this.current;
  }

  get activeOutbound(): string | null {
    return this.active;
  }

  get finished(): boolean {
    return this.current === "Stopped" || this.current === "Failed";
  }

  transition(next: SessionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`tester_invalid_transition:${this.current}->${next}`);
    }
    if (next !== "Probing") this.active = null;
    this.current = next;
    this.history.push(next);
  }

  confirm(outbound: string): void {
    if (this.current !== "Switching") {
      throw new Error(`tester_invalid_confirm:${this.current}`);
    }
    this.transition("Probing");
    this.active = outbound;
  }
}

export type ProbeFailureKind = "SwitchTimeout" | "Unreachable" | "ProcessCrash" | "ProcessLaunch" | "Cancelled";

export interface Probe {
  ok: true;
  outbound: string;
  egressIp: string;
  latencyMs: number | null;
}

export interface ProbeFailure {
  ok: false;
  kind: ProbeFailureKind;
  error: DetectionError;
}

export type ProbeOutcome = Probe | ProbeFailure;

export interface TesterRunResult {
  probes: Map<NodeKey, ProbeOutcome>;
  fatal: SessionFatalError | null;
}

export interface TesterOptions {
  runtime: ProxyCoreRuntime;
  fetchEgress?: EgressFetcher;
  checkUrl?: string;
  groupName?: string;
  startupTimeoutMs?: number;
  apiPollIntervalMs?: number;
  switchTimeoutMs?: number;
  switchPollIntervalMs?: number;
  probeTimeoutMs?: number;
  delayTimeoutMs?: number;
  measureDelay?: boolean;
  /** When set, an egress equal to this address means the node did not carry the traffic. */
  localIp?: string | null;
  allocatePort?: () => Promise<number>;
  tmpRoot?: string;
}

export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      server.close(() => (port > 0 ? resolve(port) : reject(new Error("free_port_unavailable"))));
    });
  });
}

function failureKind(error: SessionFatalError): ProbeFailureKind {
  if (error instanceof ProcessLaunchError) return "ProcessLaunch";
  if (error instanceof ProcessCrashError) return "ProcessCrash";
  return "Cancelled";
}

function isSessionFatal(error: unknown): error is SessionFatalError {
  return error instanceof ProcessLaunchError || error instanceof ProcessCrashError || error instanceof RunCancelledError;
}

interface RunContext {
  session: TesterSession;
  controller: ProxyController;
  proc: ProxyCoreProcess;
  signal?: AbortSignal;
}

/**
 * Precise-mode prober. One run owns one proxy-core process; nodes are switched and
 * probed strictly one after another, and the process and its temp directory are
 * removed on every exit path.
 */
export class PreciseTester {
  private readonly options: TesterOptions;

  private readonly fetchEgress: EgressFetcher;

  private running = false;

  constructor(options: TesterOptions) {
    this.options = options;
    this.fetchEgress = options.fetchEgress ?? createEgressFetcher();
  }

  async run(input: readonly ProxyNode[], signal?: AbortSignal): Promise<TesterRunResult> {
    if (this.running) {
      throw new Error("tester_busy:a precise run is already in progress");
    }
    this.running = true;
    try {
      return await this.runSession(dedupeNodes(input), signal);
    } finally {
      this.running = false;
    }
  }

  private async runSession(nodes: ProxyNode[], signal?: AbortSignal): Promise<TesterRunResult> {
    const session = new TesterSession();
    const probes = new Map<NodeKey, ProbeOutcome>();
    let fatal: SessionFatalError | null = null;
    let workDir: string | undefined;
    let proc: ProxyCoreProcess | undefined;

    if (nodes.length === 0) {
      session.transition("Stopped");
      return { probes, fatal };
    }

    try {
      if (signal?.aborted) throw new RunCancelledError("before_start");

      const groupName = this.options.groupName ?? "PROBE";
      const allocatePort = this.options.allocatePort ?? findFreePort;
      const mixedPort = await allocatePort();
      const apiPort = await allocatePort();
      const secret = randomBytes(16).toString("hex");
      const { config, outbounds } = buildProbeConfig({ nodes, mixedPort, apiPort, secret, groupName });

      const dir = await mkdtemp(path.join(this.options.tmpRoot ?? os.tmpdir(), "node-probe-")).catch((error: unknown) => {
        throw new ProcessLaunchError(`temp_dir_failed:${errorMessage(error)}`, { cause: error });
      });
      workDir = dir;
      const configPath = path.join(dir, "config.yaml");
      await writeFile(configPath, yamlStringify(config), "utf8").catch((error: unknown) => {
        throw new ProcessLaunchError(`config_write_failed:${errorMessage(error)}`, { cause: error });
      });
      session.transition("ConfigGenerated");
      log.info(`probe config with ${nodes.length} outbounds written to ${dir}`);

      const started = await this.options.runtime.launch({ configPath, workDir: dir }).catch((error: unknown) => {
        throw new ProcessLaunchError(`spawn_failed:${errorMessage(error)}`, { cause: error });
      });
      proc = started;
      session.transition("ProcessStarted");

      const controller = this.options.runtime.connect({
        apiBaseUrl: `http://127.0.0.1:${apiPort}`,
        secret,
        proxyServer: `http://127.0.0.1:${mixedPort}`,
        groupName,
      });
      const version = await waitForApi(controller, started, {
        timeoutMs: this.options.startupTimeoutMs ?? 15_000,
        intervalMs: this.options.apiPollIntervalMs ?? 500,
        signal,
      });
      session.transition("ApiReady");
      log.info(`proxy core ${version} ready, probing ${nodes.length} nodes`);

      const context: RunContext = { session, controller, proc: started, signal };
      for (const [index, node] of nodes.entries()) {
        if (signal?.aborted) throw new RunCancelledError(`after_${index}_of_${nodes.length}`);
        if (started.hasExited()) throw new ProcessCrashError(await started.exited, started.logTail());
        const outbound = outbounds.get(nodeKey(node)) ?? node.name;
        const outcome = await this.probeNode(context, outbound);
        probes.set(nodeKey(node), outcome);
        log.info(
          `[${index + 1}/${nodes.length}] ${outbound}: ${outcome.ok ? `${outcome.egressIp} ${outcome.latencyMs ?? "-"}ms` : outcome.error.message}`,
        );
      }
      session.transition("Stopped");
    } catch (error) {
      fatal = this.toFatal(error, session, proc, signal);
      log.error(`precise run aborted: ${fatal.message}`);
      if (!session.finished) session.transition("Failed");
      const kind = failureKind(fatal);
      for (const node of nodes) {
        const key = nodeKey(node);
        if (!probes.has(key)) probes.set(key, { ok: false, kind, error: fatal });
      }
    } finally {
      await this.teardown(proc, workDir);
    }
    return { probes, fatal };
  }

  private toFatal(
    error: unknown,
    session: TesterSession,
    proc: ProxyCoreProcess | undefined,
    signal?: AbortSignal,
  ): SessionFatalError {
    if (isSessionFatal(error)) return error;
    if (signal?.aborted) return new RunCancelledError(errorMessage(signal.reason));
    const beforeReady = ["Init", "ConfigGenerated", "ProcessStarted"].includes(session.state);
    if (beforeReady) return new ProcessLaunchError(errorMessage(error), { cause: error });
    return new ProcessCrashError(null, `${errorMessage(error)}${proc ? ` logs=${proc.logTail()}` : ""}`);
  }

  /** Races a step against process exit and cancellation. */
  private async guard<T>(context: RunContext, task: Promise<T>): Promise<T> {
    const { proc, signal } = context;
    let onAbort: (() => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      if (!signal) return;
      onAbort = () => reject(new RunCancelledError(errorMessage(signal.reason)));
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });
    const crashed = proc.exited.then((code): never => {
      throw new ProcessCrashError(code, proc.logTail());
    });
    try {
      return await Promise.race([task, crashed, cancelled]);
    } finally {
      if (onAbort) signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * One control-API or egress call under its own deadline. The call is aborted when the
   * deadline passes, the process dies or the run is cancelled, and this only returns
   * once it has settled, so nothing from one node is still in flight for the next.
   */
  private async bounded<T>(
    context: RunContext,
    timeoutMs: number,
    onTimeout: () => Error,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const step = new AbortController();
    const parent = context.signal ? AbortSignal.any([step.signal, context.signal]) : step.signal;
    const task = withDeadline(call, timeoutMs, onTimeout, parent);
    try {
      return await this.guard(context, task);
    } catch (error) {
      step.abort(error);
      throw error;
    } finally {
      await task.then(
        () => undefined,
        () => undefined,
      );
    }
  }

  /** Non-fatal step errors become a failure; a dead process or a cancelled run is rethrown. */
  private async escalate(context: RunContext, error: unknown): Promise<void> {
    if (isSessionFatal(error)) throw error;
    if (context.signal?.aborted) throw new RunCancelledError(errorMessage(context.signal.reason));
    if (context.proc.hasExited()) {
      throw new ProcessCrashError(await context.proc.exited, context.proc.logTail());
    }
  }

  private async probeNode(context: RunContext, outbound: string): Promise<ProbeOutcome> {
    const { session, controller } = context;
    const switchTimeoutMs = this.options.switchTimeoutMs ?? 5_000;
    const pollMs = this.options.switchPollIntervalMs ?? 100;

    session.transition("Switching");
    try {
      const deadline = Date.now() + switchTimeoutMs;
      await this.bounded(
        context,
        switchTimeoutMs,
        () => new SwitchTimeoutError(outbound, "select_timeout"),
        (signal) => controller.setGroupProxy(outbound, signal),
      );
      for (;;) {
        const now = await this.bounded(
          context,
          switchTimeoutMs,
          () => new SwitchTimeoutError(outbound, "confirm_timeout"),
          (signal) => controller.getGroupSelection(signal),
        );
        if (now === outbound) break;
        if (Date.now() >= deadline) {
          throw new SwitchTimeoutError(outbound, `not_confirmed:now=${now ?? "none"}`);
        }
        await this.guard(context, sleep(pollMs));
      }
    } catch (error) {
      await this.escalate(context, error);
      const failure =
        error instanceof SwitchTimeoutError ? error : new SwitchTimeoutError(outbound, errorMessage(error));
      return { ok: false, kind: "SwitchTimeout", error: failure };
    }
    session.confirm(outbound);

    let latencyMs: number | null = null;
    if (this.options.measureDelay ?? true) {
      const delayTimeoutMs = this.options.delayTimeoutMs ?? 5_000;
      const checkUrl = this.options.checkUrl ?? "https://www.gstatic.com/generate_204";
      try {
        latencyMs = await this.bounded(
          context,
          delayTimeoutMs + 1_000,
          () => new Error(`delay_timeout_${delayTimeoutMs}ms`),
          (signal) => controller.testDelay(outbound, checkUrl, delayTimeoutMs, signal),
        );
      } catch (error) {
        await this.escalate(context, error);
        log.debug(`delay test for ${outbound} gave up: ${errorMessage(error)}`);
      }
    }

    const probeTimeoutMs = this.options.probeTimeoutMs ?? 10_000;
    let egressIp: string;
    try {
      egressIp = await this.bounded(
        context,
        probeTimeoutMs,
        () => new UnreachableError(outbound, `timeout_${probeTimeoutMs}ms`),
        (signal) => this.fetchEgress(controller.proxyServer, probeTimeoutMs, signal),
      );
    } catch (error) {
      await this.escalate(context, error);
      const failure =
        error instanceof UnreachableError ? error : new UnreachableError(outbound, errorMessage(error), { cause: error });
      return { ok: false, kind: "Unreachable", error: failure };
    }

    if (this.options.localIp && egressIp === this.options.localIp) {
      return { ok: false, kind: "Unreachable", error: new UnreachableError(outbound, `egress_equals_local_ip:${egressIp}`) };
    }
    return { ok: true, outbound, egressIp, latencyMs };
  }

  private async teardown(proc: ProxyCoreProcess | undefined, workDir: string | undefined): Promise<void> {
    if (proc) {
      try {
        await proc.stop();
      } catch (error) {
        log.warn(`stopping proxy core failed: ${errorMessage(error)}`);
      }
    }
    if (workDir) {
      try {
        await rm(workDir, { recursive: true, force: true });
      } catch (error) {
        log.warn(`removing ${workDir} failed: ${errorMessage(error)}`);
      }
    }
  }
}
