import { Buffer } from "node:buffer";

export const SHARE_LINK_SCHEMES = ["ss", "vmess", "vless", "trojan", "hysteria2", "hy2", "tuic"] as const;

type ProxyRecord = Record<string, unknown>;

export function decodeBase64(text: string): string {
  return Buffer.from(text.trim(), "base64").toString("utf8");
}

export function looksLikeShareLink(line: string): boolean {
  const trimmed = line.trim().toLowerCase();
  return SHARE_LINK_SCHEMES.some((scheme) => trimmed.startsWith(`${scheme}://`));
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function stripBrackets(host: string): string {
  return host.replace(/^\[|\]$/g, "");
}

function fragmentName(hash: string): string {
  return hash.startsWith("#") ? safeDecode(hash.slice(1)).trim() : "";
}

function splitHostPort(value: string): { server: string; port: number } | null {
  const matched = value.match(/^\[?([^\]]+?)\]?:(\d{1,5})$/);
  if (!matched?.[1] || !matched[2]) return null;
  return { server: matched[1], port: Number.parseInt(matched[2], 10) };
}

function parseShadowsocks(link: string): ProxyRecord | null {
  let body = link.slice("ss://".length);
  let name = "";
  const hashAt = body.indexOf("#");
  if (hashAt >= 0) {
    name = safeDecode(body.slice(hashAt + 1)).trim();
    body = body.slice(0, hashAt);
  }
  body = body.replace(/\/?\?.*$/, "");

  let userinfo: string;
  let hostPart: string;
  const at = body.lastIndexOf("@");
  if (at >= 0) {
    userinfo = safeDecode(body.slice(0, at));
    hostPart = body.slice(at + 1);
    if (!userinfo.includes(":")) {
      userinfo = decodeBase64(userinfo);
    }
  } else {
    const decoded = decodeBase64(body);
    const innerAt = decoded.lastIndexOf("@");
    if (innerAt < 0) return null;
    userinfo = decoded.slice(0, innerAt);
    hostPart = decoded.slice(innerAt + 1);
  }

  const colon = userinfo.indexOf(":");
  const endpoint = splitHostPort(hostPart.trim());
  if (colon <= 0 || !endpoint) return null;
  return {
    name: name || `ss-${endpoint.server}:${endpoint.port}`,
    type: "ss",
    server: endpoint.server,
    port: endpoint.port,
    cipher: userinfo.slice(0, colon),
    password: userinfo.slice(colon + 1),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

function parseVmess(link: string): ProxyRecord | null {
  let payload: unknown;
  try {
    payload = JSON.parse(decodeBase64(link.slice("vmess://".length)));
  } catch {
    return null;
  }
  if (!isRecord(payload)) return null;
  const conf = payload;
  const server = readString(conf, "add");
  const port = Number.parseInt(readString(conf, "port"), 10);
  const uuid = readString(conf, "id");
  if (!server || !Number.isFinite(port) || !uuid) return null;

  const proxy: ProxyRecord = {
    name: readString(conf, "ps") || `vmess-${server}:${port}`,
    type: "vmess",
    server,
    port,
    uuid,
    alterId: Number.parseInt(readString(conf, "aid") || "0", 10) || 0,
    cipher: readString(conf, "scy") || "auto",
  };

  const network = readString(conf, "net") || "tcp";
  const path = readString(conf, "path");
  const host = readString(conf, "host");
  if (network === "ws") {
    proxy.network = "ws";
    const wsOpts: Record<string, unknown> = {};
    if (path) wsOpts.path = path;
    if (host) wsOpts.headers = { Host: host };
    if (Object.keys(wsOpts).length > 0) proxy["ws-opts"] = wsOpts;
  } else if (network === "grpc") {
    proxy.network = "grpc";
    if (path) proxy["grpc-opts"] = { "grpc-service-name": path };
  } else if (network === "h2") {
    proxy.network = "h2";
    const h2Opts: Record<string, unknown> = {};
    if (path) h2Opts.path = path;
    if (host) h2Opts.host = [host];
    if (Object.keys(h2Opts).length > 0) proxy["h2-opts"] = h2Opts;
  }

  if (readString(conf, "tls") === "tls") {
    proxy.tls = true;
    const sni = readString(conf, "sni");
    if (sni) proxy.servername = sni;
  }
  return proxy;
}

interface UrlParts {
  server: string;
  port: number;
  username: string;
  password: string;
  name: string;
  params: URLSearchParams;
}

function parseUrlLink(link: string, defaultPort = 443): UrlParts | null {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }
  const server = stripBrackets(url.hostname);
  if (!server) return null;
  return {
    server,
    port: url.port ? Number.parseInt(url.port, 10) : defaultPort,
    username: safeDecode(url.username),
    password: safeDecode(url.password),
    name: fragmentName(url.hash),
    params: url.searchParams,
  };
}

function applyTransport(proxy: ProxyRecord, params: URLSearchParams): void {
  const network = params.get("type") || "tcp";
  if (network === "ws") {
    proxy.network = "ws";
    const wsOpts: Record<string, unknown> = {};
    const path = params.get("path");
    const host = params.get("host");
    if (path) wsOpts.path = path;
    if (host) wsOpts.headers = { Host: host };
    if (Object.keys(wsOpts).length > 0) proxy["ws-opts"] = wsOpts;
  } else if (network === "grpc") {
    proxy.network = "grpc";
    const serviceName = params.get("serviceName");
    if (serviceName) proxy["grpc-opts"] = { "grpc-service-name": serviceName };
  } else if (network !== "tcp") {
    proxy.network = network;
  }
}

function parseVless(link: string): ProxyRecord | null {
  const parts = parseUrlLink(link);
  if (!parts || !parts.username) return null;
  const { params } = parts;
  const security = params.get("security") || "";
  const proxy: ProxyRecord = {
    name: parts.name || `vless-${parts.server}:${parts.port}`,
    type: "vless",
    server: parts.server,
    port: parts.port,
    uuid: parts.username,
    tls: security === "tls" || security === "reality",
  };
  const flow = params.get("flow");
  if (flow) proxy.flow = flow;
  const sni = params.get("sni");
  if (sni) proxy.servername = sni;
  applyTransport(proxy, params);

  if (security === "reality") {
    const realityOpts: Record<string, unknown> = {};
    const publicKey = params.get("pbk");
    const shortId = params.get("sid");
    if (publicKey) realityOpts["public-key"] = publicKey;
    if (shortId) realityOpts["short-id"] = shortId;
    proxy["reality-opts"] = realityOpts;
    const fingerprint = params.get("fp");
    if (fingerprint) proxy["client-fingerprint"] = fingerprint;
  }
  return proxy;
}

function parseTrojan(link: string): ProxyRecord | null {
  const parts = parseUrlLink(link);
  if (!parts || !parts.username) return null;
  const proxy: ProxyRecord = {
    name: parts.name || `trojan-${parts.server}:${parts.port}`,
    type: "trojan",
    server: parts.server,
    port: parts.port,
    password: parts.username,
  };
  const sni = parts.params.get("sni");
  if (sni) proxy.sni = sni;
  applyTransport(proxy, parts.params);
  return proxy;
}

function parseHysteria2(link: string): ProxyRecord | null {
  const parts = parseUrlLink(link);
  if (!parts) return null;
  const { params } = parts;
  const proxy: ProxyRecord = {
    name: parts.name || `hy2-${parts.server}:${parts.port}`,
    type: "hysteria2",
    server: parts.server,
    port: parts.port,
    password: parts.password ? `${parts.username}:${parts.password}` : parts.username,
  };
  const sni = params.get("sni");
  if (sni) proxy.sni = sni;
  const obfs = params.get("obfs");
  if (obfs) {
    proxy.obfs = obfs;
    const obfsPassword = params.get("obfs-password");
    if (obfsPassword) proxy["obfs-password"] = obfsPassword;
  }
  if (params.get("insecure") === "1") proxy["skip-cert-verify"] = true;
  return proxy;
}

function parseTuic(link: string): ProxyRecord | null {
  const parts = parseUrlLink(link);
  if (!parts) return null;
  const { params } = parts;
  const proxy: ProxyRecord = {
    name: parts.name || `tuic-${parts.server}:${parts.port}`,
    type: "tuic",
    server: parts.server,
    port: parts.port,
    uuid: parts.username,
    password: parts.password,
    "congestion-controller": params.get("congestion_control") || "bbr",
  };
  const alpn = params.get("alpn");
  if (alpn) proxy.alpn = alpn.split(",");
  const sni = params.get("sni");
  if (sni) proxy.sni = sni;
  const relayMode = params.get("udp_relay_mode");
  if (relayMode) proxy["udp-relay-mode"] = relayMode;
  return proxy;
}

/** Decodes one share link into a mihomo `proxies` entry, or null when it cannot be read. */
export function parseShareLink(link: string): ProxyRecord | null {
  const trimmed = link.trim();
  const scheme = trimmed.slice(0, trimmed.indexOf("://")).toLowerCase();
  switch (scheme) {
    case "ss":
      return parseShadowsocks(trimmed);
    case "vmess":
      return parseVmess(trimmed);
    case "vless":
      return parseVless(trimmed);
    case "trojan":
      return parseTrojan(trimmed);
    case "hysteria2":
    case "hy2":
      return parseHysteria2(trimmed);
    case "tuic":
      return parseTuic(trimmed);
    default:
      return null;
  }
}
