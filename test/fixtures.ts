import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { SignatureVerifier, VerifyOutcome, VerifyRequest } from "../src/signature/verifier.js";

export const MAIN_TF = 'resource "null_resource" "example" {}\n';

export const TEST_PEM = "-----BEGIN PUBLIC KEY-----\ntest-public-key\n-----END PUBLIC KEY-----\n";

export const STATEMENT = {
  _type: "https://in-toto.io/Statement/v0.1",
  subject: [{ name: "main.tf", digest: { sha256: "0000" } }],
  predicateType: "https://slsa.dev/provenance/v0.2",
  predicate: { builder: { id: "test-builder" } },
};

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function makeTempDir(prefix = "cdfctl-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string | Buffer>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

export function writeJson(root: string, rel: string, value: unknown): void {
  writeFiles(root, { [rel]: JSON.stringify(value, null, 2) });
}

/** Manifest declaring each file with its real digest. */
export function manifestFor(files: Record<string, string>) {
  return {
    cdf_version: "1.0",
    pattern: "p",
    files: Object.entries(files).map(([name, content]) => ({ name, sha256: sha256(content), signature: `${name}.sig` })),
  };
}

/** The smallest passing bundle: one declared `main.tf` and its manifest. */
export function writeScenarioBundle(root: string): void {
  writeFiles(root, { "main.tf": MAIN_TF });
  writeJson(root, "cdf-meta.json", manifestFor({ "main.tf": MAIN_TF }));
}

/**
 * Make the numbered `fs.readdirSync` calls (1-based, counted from now) fail
 * with EACCES for `dir`; all other calls read the disk. Restore with
 * `vi.restoreAllMocks()`.
 */
export function denyReaddir(dir: string, failingCalls: readonly number[]): void {
  const readdir = fs.readdirSync;
  const spy = vi.spyOn(fs, "readdirSync");
  const last = Math.max(...failingCalls);
  for (let call = 1; call <= last; call++) {
    if (failingCalls.includes(call)) {
      spy.mockImplementationOnce(() => {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: "EACCES" });
      });
    } else {
      spy.mockImplementationOnce(readdir);
    }
  }
}

export type FakeVerifier = SignatureVerifier & { calls: VerifyRequest[] };

export function fakeVerifier(
  respond: VerifyOutcome | ((req: VerifyRequest) => Promise<VerifyOutcome>) = { ok: true },
): FakeVerifier {
  const calls: VerifyRequest[] = [];
  return {
    name: "fake",
    calls,
    async verifySignature(req) {
      calls.push(req);
      return typeof respond === "function" ? respond(req) : respond;
    },
  };
}
