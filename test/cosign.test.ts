import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import { CosignVerifier, type ExecFn, type ExecOptions } from "../src/signature/cosign.js";
import type { VerifyRequest } from "../src/signature/verifier.js";
import { TEST_PEM } from "./fixtures.js";

const KEY_REQUEST: VerifyRequest = {
  documentPath: "/bundle/main.attestation.json",
  signaturePath: "/bundle/main.attestation.sig",
  mode: { kind: "key", publicKeyPem: TEST_PEM },
};

const CERT_REQUEST: VerifyRequest = {
  documentPath: "/bundle/main.attestation.json",
  signaturePath: "/bundle/main.attestation.sig",
  mode: {
    kind: "certificate",
    certificatePath: "/bundle/main.attestation.cert",
    identity: { identityRegexp: "^https://ci\\.example\\.test/", issuerRegexp: "^https://issuer\\.example\\.test$", insecure: false },
  },
};

function failingExec(error: Error): ExecFn {
  return async () => {
    throw error;
  };
}

describe("cosign verifier", () => {
  const origEnv = { ...process.env };

  afterEach(() => {
    delete process.env.COSIGN_PASSWORD;
    Object.assign(process.env, origEnv);
  });

  it("builds key-based verify-blob arguments", () => {
    expect(new CosignVerifier().buildArgs(KEY_REQUEST, "/tmp/k/cosign.pub")).toEqual([
      "verify-blob",
      "--key",
      "/tmp/k/cosign.pub",
      "--signature",
      "/bundle/main.attestation.sig",
      "/bundle/main.attestation.json",
    ]);
  });

  it("builds certificate arguments with the identity policy", () => {
    expect(new CosignVerifier({ insecureIgnoreTlog: true }).buildArgs(CERT_REQUEST)).toEqual([
      "verify-blob",
      "--certificate",
      "/bundle/main.attestation.cert",
      "--certificate-identity-regexp",
      "^https://ci\\.example\\.test/",
      "--certificate-oidc-issuer-regexp",
      "^https://issuer\\.example\\.test$",
      "--signature",
      "/bundle/main.attestation.sig",
      "--insecure-ignore-tlog",
      "/bundle/main.attestation.json",
    ]);
  });

  it("refuses key mode without a key file", () => {
    expect(() => new CosignVerifier().buildArgs(KEY_REQUEST)).toThrow("key file required for key-based verification");
  });

  it("writes the key to a private temp file for the call and removes it after", async () => {
    process.env.COSIGN_PASSWORD = "test-secret";
    const seen: Array<{ file: string; args: string[]; opts: ExecOptions; key: string; keyMode: number }> = [];
    const exec: ExecFn = async (file, args, opts) => {
      const keyFile = args[2] ?? "";
      seen.push({ file, args, opts, key: fs.readFileSync(keyFile, "utf8"), keyMode: fs.statSync(keyFile).mode & 0o777 });
      return { stdout: "Verified OK", stderr: "" };
    };

    const outcome = await new CosignVerifier({ cosignPath: "/opt/bin/cosign", timeoutMs: 1234, exec }).verifySignature(KEY_REQUEST);

    expect(outcome).toEqual({ ok: true });
    expect(seen).toHaveLength(1);
    const call = seen[0];
    expect(call?.file).toBe("/opt/bin/cosign");
    expect(call?.key).toBe(TEST_PEM);
    expect(call?.keyMode).toBe(0o600);
    expect(call?.opts.timeout).toBe(1234);
    expect(call?.opts.env?.COSIGN_PASSWORD).toBeUndefined();
    expect(fs.existsSync(call?.args[2] ?? "")).toBe(false);
  });

  it("reports a missing binary as unavailable", async () => {
    const exec = failingExec(Object.assign(new Error("spawn cosign ENOENT"), { code: "ENOENT" }));

    expect(await new CosignVerifier({ exec }).verifySignature(CERT_REQUEST)).toEqual({
      ok: false,
      reason: "unavailable",
      detail: "cosign not available at cosign",
    });
  });

  it("reports a timeout as unavailable", async () => {
    const exec = failingExec(Object.assign(new Error("Command failed"), { killed: true, signal: "SIGTERM", code: null }));

    expect(await new CosignVerifier({ timeoutMs: 50, exec }).verifySignature(CERT_REQUEST)).toEqual({
      ok: false,
      reason: "unavailable",
      detail: "cosign timed out after 50ms",
    });
  });

  it("reports a non-zero exit as an invalid signature", async () => {
    const exec = failingExec(
      Object.assign(new Error("Command failed"), { code: 1, stderr: "Error: invalid signature when validating ASN.1 encoded signature\n" }),
    );

    expect(await new CosignVerifier({ exec }).verifySignature(CERT_REQUEST)).toEqual({
      ok: false,
      reason: "invalid",
      detail: "Error: invalid signature when validating ASN.1 encoded signature",
    });
  });

  it("redacts key material echoed by cosign", async () => {
    const exec = failingExec(Object.assign(new Error("Command failed"), { code: 1, stderr: `bad key ${TEST_PEM}` }));

    const outcome = await new CosignVerifier({ exec }).verifySignature(KEY_REQUEST);

    expect(outcome).toEqual({ ok: false, reason: "invalid", detail: "bad key [REDACTED PEM]" });
  });
});
