import { createLogger } from "../log.js";

const log = createLogger("push");

export interface PushOptions {
  /** Relay base URL; `/api/config` is appended. */
  url: string;
  token?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export interface PushResult {
  status: number;
  body: string;
}

/** Uploads the filtered configuration to the subscription relay. */
export async function pushToRelay(content: string, options: PushOptions): Promise<PushResult> {
  if (!content.trim()) {
    throw new Error("relay_push_failed:empty_content");
  }
  const endpoint = `${options.url.replace(/\/+$/, "")}/api/config`;
  const timeoutMs = options.timeoutMs ?? 30_000;
  const headers: Record<string, string> = { "Content-Type": "text/yaml; charset=utf-8" };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const resp = await (options.fetchImpl ?? fetch)(endpoint, { method: "PUT", headers, body: content, signal: controller.signal });
    const body = await resp.text();
    if (!resp.ok) {
      throw new Error(`relay_push_failed:${resp.status}:${body.slice(0, 200)}`);
    }
    log.info(`pushed ${Buffer.byteLength(content)} bytes to ${endpoint}`);
    return { status: resp.status, body };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(`relay_push_failed:timeout_${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
