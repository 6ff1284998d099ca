import { resolve, isAbsolute } from "node:path";

export const MAX_LOG_MESSAGE = 10000;

/**
 * Sanitize a single path component (manifest name, run id) before it is joined
 * into a filesystem path.
 * @throws Error if the component is empty or could escape its directory
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Join components under an absolute base, refusing anything that resolves outside it.
 * @throws Error if path traversal is detected
 */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }

  const sanitized = components.map(sanitizePathComponent);
  const fullPath = resolve(base, ...sanitized);
  const normalizedBase = resolve(base);

  if (!fullPath.startsWith(normalizedBase + "/") && fullPath !== normalizedBase) {
    throw new Error(`Path traversal detected: ${fullPath}`);
  }

  return fullPath;
}

/** Escape line breaks and tabs so one event stays one log line. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/\r?\n/g, "\\n").replace(/\r/g, "\\n").replace(/\t/g, "\\t").slice(0, MAX_LOG_MESSAGE);
}

/** Redact credentials and home directories from messages and build output. */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/(https?:\/\/)[^/\s:@]+:[^/\s@]+@/gi, "$1***@");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}

/** Environment passed to docker/cosign/git: the basics plus the tool's own variables. */
export function sanitizeEnv(env: NodeJS.ProcessEnv, passthroughPrefixes: string[] = []): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const key of ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM", "TMPDIR"]) {
    if (env[key] !== undefined) safe[key] = env[key];
  }
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && passthroughPrefixes.some((p) => key.startsWith(p))) {
      safe[key] = value;
    }
  }
  return safe;
}
