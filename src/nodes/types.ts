export const NODE_TYPES = [
  "ss",
  "ssr",
  "vmess",
  "vless",
  "trojan",
  "hysteria",
  "hysteria2",
  "tuic",
  "socks5",
  "http",
  "wireguard",
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

/** Fields every protocol carries beyond the common ones; the rest of the record is opaque. */
export interface ProtocolParams {
  ss: { cipher: string; password: string };
  ssr: { cipher: string; password: string; protocol: string; obfs: string };
  vmess: { uuid: string };
  vless: { uuid: string };
  trojan: { password: string };
  hysteria: Record<never, never>;
  hysteria2: Record<never, never>;
  tuic: Record<never, never>;
  socks5: Record<never, never>;
  http: Record<never, never>;
  wireguard: { "private-key": string };
}

export type NodeParams<T extends NodeType> = Readonly<ProtocolParams[T] & Record<string, unknown>>;

interface NodeOf<T extends NodeType> {
  readonly type: T;
  readonly name: string;
  readonly server: string;
  readonly port: number;
  readonly params: NodeParams<T>;
}

export type ProxyNode = { [T in NodeType]: NodeOf<T> }[NodeType];

/** Identity is (type, server, port); the display name is not part of it. */
export type NodeKey = string;

export function nodeKey(node: Pick<ProxyNode, "type" | "server" | "port">): NodeKey {
  return `${node.type}|${node.server}|${node.port}`;
}

export function isNodeType(value: unknown): value is NodeType {
  return typeof value === "string" && NODE_TYPES.some((type) => type === value);
}

/** Flattens a node back into the mihomo `proxies` entry shape. */
export function toProxyRecord(node: ProxyNode, name: string = node.name): Record<string, unknown> {
  return { ...node.params, name, type: node.type, server: node.server, port: node.port };
}
