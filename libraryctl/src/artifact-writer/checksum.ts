import { createHash } from "node:crypto";
import fs from "node:fs";

/** Compute SHA256 hash of a file (hex). */
export function computeSha256(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a string/buffer (hex). */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** OCI-style digest string, `sha256:<hex>`. */
export function sha256Digest(content: string | Buffer): string {
  return `sha256:${computeSha256FromContent(content)}`;
}
