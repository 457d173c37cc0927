import { createHash } from "node:crypto";

/** SHA-256 hex of trimmed title + "::" + trimmed URL. Case is preserved:
 *  two headlines that differ only by case are different articles. */
export function articleHash(title: string, url: string): string {
  return createHash("sha256")
    .update(`${title.trim()}::${url.trim()}`, "utf8")
    .digest("hex");
}
