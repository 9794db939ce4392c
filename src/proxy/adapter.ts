/**
 * Control-API view of one running proxy-core instance. An aborted `signal` cancels
 * the underlying request; the returned promise settles once it has stopped.
 */
export interface ProxyController {
  apiBaseUrl: string;
  proxyServer: string;
  groupName: string;
  version(): Promise<string>;
  getGroupSelection(signal?: AbortSignal): Promise<string | null>;
  setGroupProxy(name: string, signal?: AbortSignal): Promise<void>;
  /** Built-in delay test; null when the core reports a failure. */
  testDelay(name: string, url: string, timeoutMs: number, signal?: AbortSignal): Promise<number | null>;
}

export interface ProxyCoreProcess {
  readonly pid: number | undefined;
  /** Settles with the exit code, or null when the process died from a signal or never started. */
  readonly exited: Promise<number | null>;
  hasExited(): boolean;
  logTail(): string;
  stop(): Promise<void>;
}

export interface LaunchSpec {
  configPath: string;
  workDir: string;
}

export interface ControllerEndpoint {
  apiBaseUrl: string;
  secret: string;
  proxyServer: string;
  groupName: string;
}

/** Everything the precise tester needs from the outside world to run a proxy core. */
export interface ProxyCoreRuntime {
  launch(spec: LaunchSpec): Promise<ProxyCoreProcess>;
  connect(endpoint: ControllerEndpoint): ProxyController;
}
