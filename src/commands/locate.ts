import path from "node:path";
import { locateBundle } from "../bundle/locate.js";
import { findManifestFile } from "../manifest/loader.js";
import { resolveConfig } from "./validate.js";

export type LocateResult =
  | { ok: true; bundleRoot: string; manifestFile: string | null }
  | { ok: false; error: { code: "CONFIG_INVALID" | "BUNDLE_NOT_FOUND"; message: string } };

/** Report which bundle `validate` would check, and which manifest file it would read. */
export function locate(opts: { cdfPath?: string; configFile?: string; cwd?: string; env?: NodeJS.ProcessEnv }): LocateResult {
  const cwd = opts.cwd ?? process.cwd();
  const resolved = resolveConfig({ configFile: opts.configFile, env: opts.env ?? process.env });
  if (!resolved.ok) return { ok: false, error: { code: "CONFIG_INVALID", message: resolved.error.message } };

  const names = resolved.config.manifest_names;
  const located = locateBundle(opts.cdfPath ? path.resolve(cwd, opts.cdfPath) : undefined, cwd, names);
  if (!located) {
    return { ok: false, error: { code: "BUNDLE_NOT_FOUND", message: `No CDF bundle found (looked for ${names.join(", ")})` } };
  }
  return { ok: true, bundleRoot: path.relative(cwd, located) || ".", manifestFile: findManifestFile(located, names) };
}
