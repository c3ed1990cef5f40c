import crypto from "node:crypto";
import type { Post } from "./types.js";

export const FINGERPRINT_PREFIX_CHARS = 100;

/**
 * MD5 hex of the first 100 characters (code points) of the text. Posts that
 * share a 100-character prefix collapse to one fingerprint; that is intended.
 */
export function fingerprintText(text: string): string {
  const prefix = Array.from(text).slice(0, FINGERPRINT_PREFIX_CHARS).join("");
  return crypto.createHash("md5").update(prefix, "utf8").digest("hex");
}

export function fingerprintPost(post: Post): string {
  return fingerprintText(post.text);
}
