import { z } from "zod";
import { isNodeType, type ProxyNode } from "./types.js";

// YAML happily turns numeric passwords and names into numbers.
const text = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const common = {
  name: text.pipe(z.string().min(1)),
  server: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535),
};

const ssRecord = z
  .object({ type: z.literal("ss"), ...common, cipher: z.string(), password: text })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const ssrRecord = z
  .object({ type: z.literal("ssr"), ...common, cipher: z.string(), password: text, protocol: z.string(), obfs: z.string() })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const vmessRecord = z
  .object({ type: z.literal("vmess"), ...common, uuid: z.string().min(1) })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const vlessRecord = z
  .object({ type: z.literal("vless"), ...common, uuid: z.string().min(1) })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const trojanRecord = z
  .object({ type: z.literal("trojan"), ...common, password: text })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const hysteriaRecord = z
  .object({ type: z.literal("hysteria"), ...common })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const hysteria2Record = z
  .object({ type: z.literal("hysteria2"), ...common })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const tuicRecord = z
  .object({ type: z.literal("tuic"), ...common })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const socks5Record = z
  .object({ type: z.literal("socks5"), ...common })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const httpRecord = z
  .object({ type: z.literal("http"), ...common })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

const wireguardRecord = z
  .object({ type: z.literal("wireguard"), ...common, "private-key": z.string().min(1) })
  .passthrough()
  .transform(({ type, name, server, port, ...params }) => ({ type, name, server, port, params }));

export const proxyRecordSchema: z.ZodType<ProxyNode, z.ZodTypeDef, unknown> = z.union([
  ssRecord,
  ssrRecord,
  vmessRecord,
  vlessRecord,
  trojanRecord,
  hysteriaRecord,
  hysteria2Record,
  tuicRecord,
  socks5Record,
  httpRecord,
  wireguardRecord,
]);

export type RecordParseResult = { ok: true; node: ProxyNode } | { ok: false; reason: string };

export function parseProxyRecord(record: unknown): RecordParseResult {
  if (!record || typeof record !== "object") {
    return { ok: false, reason: "not_an_object" };
  }
  const type = "type" in record ? record.type : undefined;
  if (!isNodeType(type)) {
    return { ok: false, reason: `unsupported_type:${String(type)}` };
  }
  const parsed = proxyRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.flatMap((item) =>
      item.code === "invalid_union" ? item.unionErrors.flatMap((inner) => inner.issues) : [item],
    );
    const issue = issues.find((item) => !(item.code === "invalid_literal" && item.path[0] === "type"));
    const where = issue ? `${issue.path.join(".") || "(root)"}:${issue.message}` : "invalid_record";
    return { ok: false, reason: where };
  }
  return { ok: true, node: parsed.data };
}
