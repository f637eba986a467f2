import { createHash } from "node:crypto";
import { brandString, type ContentHash } from "./identity.js";

export function hashContent(content: Uint8Array | string): ContentHash {
  return brandString<"ContentHash">(createHash("sha256").update(content).digest("hex"));
}
