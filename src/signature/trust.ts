import fs from "node:fs";
import path from "node:path";
import type { CertificatePolicyConfig } from "../types/config.js";
import type { IdentityPolicy, TrustMaterial } from "./verifier.js";

export const REPO_KEY_PATH = path.join(".github", "keys", "cosign.pub");

const PEM_HEADER = /-----BEGIN [A-Z ]*PUBLIC KEY-----/;

export type TrustResolution = {
  trust: TrustMaterial;
  /** Where the public key came from, null when none was found. */
  keySource: string | null;
  warnings: string[];
};

export type TrustResult = ({ ok: true } & TrustResolution) | { ok: false; error: string };

export type TrustInputs = {
  /** PEM content, or a path to a PEM file. */
  publicKey?: string;
  publicKeyFile?: string;
  certificate: CertificatePolicyConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  bundleRoot?: string;
  /** Fall back to the key shipped inside the bundle. */
  trustBundleKey?: boolean;
};

function readIfFile(candidate: string): string | null {
  try {
    return fs.statSync(candidate).isFile() ? fs.readFileSync(candidate, "utf8") : null;
  } catch {
    return null;
  }
}

/**
 * Identity policy for certificate-based verification. There is no
 * wildcard default: without both patterns the result is undefined unless
 * `allow_any_identity` opts into accepting any identity and issuer.
 */
export function resolveIdentityPolicy(cfg: CertificatePolicyConfig): IdentityPolicy | undefined {
  const identity = cfg.identity_regexp?.trim();
  const issuer = cfg.issuer_regexp?.trim();
  if (identity && issuer) return { identityRegexp: identity, issuerRegexp: issuer, insecure: false };
  if (cfg.allow_any_identity) {
    return { identityRegexp: identity || ".*", issuerRegexp: issuer || ".*", insecure: true };
  }
  return undefined;
}

/** A key the caller named explicitly: it loads as PEM or the lookup fails. */
function loadExplicitKey(source: string, load: () => string | null): { ok: true; pem: string } | { ok: false; error: string } {
  const content = load();
  if (content === null) return { ok: false, error: `Public key not found: ${source}` };
  if (!PEM_HEADER.test(content)) return { ok: false, error: `Public key from ${source} is not a PEM public key` };
  return { ok: true, pem: content };
}

/**
 * Public key lookup. A key given with `--public-key` or
 * `signature.public_key_file` is used or the lookup fails. Otherwise:
 * COSIGN_PUBLIC_KEY_PEM, COSIGN_PUBLIC_KEY_B64, .github/keys/cosign.pub in
 * the working directory, then in the bundle when `trustBundleKey` is set.
 */
export function resolveTrustMaterial(inputs: TrustInputs): TrustResult {
  const env = inputs.env ?? process.env;
  const cwd = inputs.cwd ?? process.cwd();
  const identity = resolveIdentityPolicy(inputs.certificate);
  const warnings: string[] = [];

  const explicitKey = inputs.publicKey;
  if (explicitKey) {
    const loaded = PEM_HEADER.test(explicitKey)
      ? { ok: true as const, pem: explicitKey }
      : loadExplicitKey(explicitKey, () => readIfFile(path.resolve(cwd, explicitKey)));
    if (!loaded.ok) return loaded;
    return { ok: true, trust: { publicKeyPem: loaded.pem, identity }, keySource: "--public-key", warnings };
  }
  if (inputs.publicKeyFile) {
    const file = path.resolve(cwd, inputs.publicKeyFile);
    const loaded = loadExplicitKey(file, () => readIfFile(file));
    if (!loaded.ok) return loaded;
    return { ok: true, trust: { publicKeyPem: loaded.pem, identity }, keySource: file, warnings };
  }

  const candidates: Array<{ source: string; load: () => string | null }> = [
    { source: "COSIGN_PUBLIC_KEY_PEM", load: () => env.COSIGN_PUBLIC_KEY_PEM || null },
    {
      source: "COSIGN_PUBLIC_KEY_B64",
      load: () => (env.COSIGN_PUBLIC_KEY_B64 ? Buffer.from(env.COSIGN_PUBLIC_KEY_B64, "base64").toString("utf8") : null),
    },
    { source: REPO_KEY_PATH, load: () => readIfFile(path.resolve(cwd, REPO_KEY_PATH)) },
  ];
  const bundleKey = inputs.bundleRoot ? path.join(inputs.bundleRoot, REPO_KEY_PATH) : undefined;
  if (bundleKey && inputs.trustBundleKey) {
    candidates.push({ source: bundleKey, load: () => readIfFile(bundleKey) });
  }

  let publicKeyPem: string | undefined;
  let keySource: string | null = null;
  for (const candidate of candidates) {
    const content = candidate.load();
    if (!content) continue;
    if (!PEM_HEADER.test(content)) {
      warnings.push(`Ignoring public key from ${candidate.source}: not a PEM public key`);
      continue;
    }
    publicKeyPem = content;
    keySource = candidate.source;
    break;
  }

  if (bundleKey && keySource === bundleKey) {
    warnings.push(`Trusting public key shipped inside the bundle: ${bundleKey} (trust_bundle_key is enabled)`);
  } else if (bundleKey && keySource === null && !inputs.trustBundleKey && readIfFile(bundleKey) !== null) {
    warnings.push(`Ignoring public key shipped inside the bundle: ${bundleKey} (enable trust_bundle_key to use it)`);
  }

  return { ok: true, trust: { publicKeyPem, identity }, keySource, warnings };
}
