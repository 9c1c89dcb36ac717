import { createHash } from "node:crypto";

function is_record(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** key 按字典序递归排好；null 原样保留（状态里的 null 都有含义） */
function sort_keys(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sort_keys);
  if (!is_record(v)) return v;
  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) out[k] = sort_keys(v[k]);
  return out;
}

/** 对局状态哈希：与字段顺序无关，step() / initial_state() 用它做回放锚点 */
export function hash_state(state: unknown): string {
  const text = JSON.stringify(sort_keys(state));
  return `sha256:${createHash("sha256").update(text, "utf8").digest("hex")}`;
}
