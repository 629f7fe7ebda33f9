import path from "node:path";

export const MAX_LOG_MESSAGE_LENGTH = 10000;

/**
 * Normalize a manifest-declared path to a bundle-relative POSIX path.
 * Returns null when the path is absolute or climbs out of the bundle.
 */
export function normalizeBundlePath(declared: string): string | null {
  const unified = declared.replace(/\\/g, "/");
  if (unified.startsWith("/") || /^[a-zA-Z]:\//.test(unified)) return null;
  const normalized = path.posix.normalize(unified);
  if (normalized === "." || normalized === ".." || normalized.startsWith("../")) return null;
  return normalized.replace(/^\.\//, "");
}

/** Bundle-relative POSIX path for a file found on disk. */
export function toBundlePath(bundleRoot: string, absolutePath: string): string {
  return path.relative(bundleRoot, absolutePath).split(path.sep).join("/");
}

/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, MAX_LOG_MESSAGE_LENGTH);
}

/**
 * Redact key material and credentials from messages that may echo
 * verifier output or environment.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/-----BEGIN [A-Z ]+-----[\s\S]*?-----END [A-Z ]+-----/g, "[REDACTED PEM]");
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}

/**
 * Environment for verifier subprocesses: enough to locate binaries and
 * reach the transparency log, nothing from the CI secrets.
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const keep = ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TMPDIR", "HTTPS_PROXY", "HTTP_PROXY", "NO_PROXY", "SSL_CERT_FILE"];
  const safe: NodeJS.ProcessEnv = {};
  for (const key of keep) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return safe;
}
