import { createHash } from "node:crypto";

export function sha256Hex(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

export function stableId(prefix: string, ...parts: Array<string | number>): string {
  const digest = createHash("sha1")
    .update(parts.map((part) => String(part)).join("\u0000"))
    .digest("hex")
    .slice(0, 24);
  return `${prefix}_${digest}`;
}
