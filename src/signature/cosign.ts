import { execFile } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { errorMessage } from "../core/finding.js";
import { redactSensitiveInfo, sanitizeEnv, sanitizeLogMessage } from "../core/security.js";
import type { SignatureVerifier, VerifyOutcome, VerifyRequest } from "./verifier.js";

const pExecFile = promisify(execFile);

export const DEFAULT_VERIFY_TIMEOUT_MS = 60000;

export type ExecOptions = {
  timeout: number;
  env: NodeJS.ProcessEnv;
  maxBuffer: number;
};

export type ExecFn = (file: string, args: string[], opts: ExecOptions) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, args, { ...opts, shell: false, encoding: "utf8" });
  return { stdout, stderr };
};

export type CosignVerifierOptions = {
  cosignPath?: string;
  timeoutMs?: number;
  insecureIgnoreTlog?: boolean;
  /** Replaces child_process.execFile (tests). */
  exec?: ExecFn;
};

type ExecFailure = Error & { code?: unknown; killed?: unknown; signal?: unknown; stderr?: unknown; stdout?: unknown };

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

function outputOf(e: ExecFailure): string {
  const stderr = typeof e.stderr === "string" ? e.stderr.trim() : "";
  const stdout = typeof e.stdout === "string" ? e.stdout.trim() : "";
  return sanitizeLogMessage(redactSensitiveInfo(stderr || stdout || e.message)).slice(0, 2000);
}

/**
 * Verifies detached blob signatures by running `cosign verify-blob`
 * without a shell, with a scrubbed environment and a per-call timeout.
 */
export class CosignVerifier implements SignatureVerifier {
  readonly name = "cosign";
  private readonly cosignPath: string;
  private readonly timeoutMs: number;
  private readonly insecureIgnoreTlog: boolean;
  private readonly exec: ExecFn;

  constructor(opts: CosignVerifierOptions = {}) {
    this.cosignPath = opts.cosignPath ?? "cosign";
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS;
    this.insecureIgnoreTlog = opts.insecureIgnoreTlog ?? false;
    this.exec = opts.exec ?? defaultExec;
  }

  /** Arguments for `cosign verify-blob`; `keyFile` is required in key mode. */
  buildArgs(req: VerifyRequest, keyFile?: string): string[] {
    const args = ["verify-blob"];
    if (req.mode.kind === "key") {
      if (!keyFile) throw new Error("key file required for key-based verification");
      args.push("--key", keyFile);
    } else {
      args.push(
        "--certificate",
        req.mode.certificatePath,
        "--certificate-identity-regexp",
        req.mode.identity.identityRegexp,
        "--certificate-oidc-issuer-regexp",
        req.mode.identity.issuerRegexp,
      );
    }
    args.push("--signature", req.signaturePath);
    if (this.insecureIgnoreTlog) args.push("--insecure-ignore-tlog");
    args.push(req.documentPath);
    return args;
  }

  async verifySignature(req: VerifyRequest): Promise<VerifyOutcome> {
    let keyDir: string | null = null;
    try {
      let keyFile: string | undefined;
      if (req.mode.kind === "key") {
        keyDir = fs.mkdtempSync(path.join(os.tmpdir(), "cdfctl-key-"));
        keyFile = path.join(keyDir, "cosign.pub");
        fs.writeFileSync(keyFile, req.mode.publicKeyPem, { encoding: "utf8", mode: 0o600 });
      }

      await this.exec(this.cosignPath, this.buildArgs(req, keyFile), {
        timeout: this.timeoutMs,
        env: sanitizeEnv(process.env),
        maxBuffer: 10 * 1024 * 1024,
      });
      return { ok: true };
    } catch (e) {
      return this.classify(e);
    } finally {
      if (keyDir) fs.rmSync(keyDir, { recursive: true, force: true });
    }
  }

  private classify(e: unknown): VerifyOutcome {
    if (!isExecFailure(e)) {
      return { ok: false, reason: "unavailable", detail: redactSensitiveInfo(errorMessage(e)) };
    }
    if (e.code === "ENOENT" || e.code === "EACCES") {
      return { ok: false, reason: "unavailable", detail: `cosign not available at ${this.cosignPath}` };
    }
    if (e.killed === true || (typeof e.signal === "string" && e.signal.length > 0)) {
      return { ok: false, reason: "unavailable", detail: `cosign timed out after ${this.timeoutMs}ms` };
    }
    if (typeof e.code === "number") {
      return { ok: false, reason: "invalid", detail: outputOf(e) };
    }
    return { ok: false, reason: "unavailable", detail: outputOf(e) };
  }
}
