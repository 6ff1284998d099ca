import fs from "node:fs";

function slug(value: string, max: number): string {
  const s = value
    .replace(/[^a-zA-Z0-9_.-]/g, "-")
    .replace(/\.{2,}/g, ".")
    .replace(/^[.-]+/, "")
    .slice(0, max);
  return s || "unknown";
}

/**
 * Generate a run ID.
 * Format: {name}-{ref}-{YYYYMMDD}-{seq}
 */
export function generateRunId(name: string, ref: string, artifactsDir: string, now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const prefix = `${slug(name, 40)}-${slug(ref, 30)}-${date}`;
  return `${prefix}-${getNextSeq(artifactsDir, prefix)}`;
}

function getNextSeq(artifactsDir: string, prefix: string): string {
  if (!fs.existsSync(artifactsDir)) return "001";

  let maxSeq = 0;
  for (const entry of fs.readdirSync(artifactsDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || !entry.name.startsWith(`${prefix}-`)) continue;
    const rest = entry.name.slice(prefix.length + 1);
    if (!/^\d+$/.test(rest)) continue;
    maxSeq = Math.max(maxSeq, parseInt(rest, 10));
  }

  return String(maxSeq + 1).padStart(3, "0");
}
