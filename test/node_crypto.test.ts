import { afterEach, describe, expect, it } from "vitest";
import { generateKeyPairSync, sign, type ED25519KeyPairOptions } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { NodeCryptoVerifier, decodeSignature } from "../src/signature/node-crypto.js";
import type { VerifyRequest } from "../src/signature/verifier.js";
import { STATEMENT, makeTempDir, writeFiles } from "./fixtures.js";

const PEM_ENCODING: ED25519KeyPairOptions<"pem", "pem"> = {
  publicKeyEncoding: { type: "spki", format: "pem" },
  privateKeyEncoding: { type: "pkcs8", format: "pem" },
};

describe("builtin verifier", () => {
  let root: string;
  const document = JSON.stringify(STATEMENT);

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  function keyRequest(publicKeyPem: string): VerifyRequest {
    return {
      documentPath: path.join(root, "main.attestation.json"),
      signaturePath: path.join(root, "main.attestation.sig"),
      mode: { kind: "key", publicKeyPem },
    };
  }

  it("decodes base64 signature text", () => {
    expect(decodeSignature(Buffer.from("aGVsbG8=\n")).toString("utf8")).toBe("hello");
  });

  it("accepts an ECDSA signature written as base64", async () => {
    root = makeTempDir();
    const { publicKey, privateKey } = generateKeyPairSync("ec", { namedCurve: "P-256", ...PEM_ENCODING });
    const signature = sign("sha256", Buffer.from(document), privateKey);
    writeFiles(root, { "main.attestation.json": document, "main.attestation.sig": signature.toString("base64") });

    expect(await new NodeCryptoVerifier().verifySignature(keyRequest(publicKey))).toEqual({ ok: true });
  });

  it("accepts an Ed25519 signature", async () => {
    root = makeTempDir();
    const { publicKey, privateKey } = generateKeyPairSync("ed25519", PEM_ENCODING);
    writeFiles(root, {
      "main.attestation.json": document,
      "main.attestation.sig": sign(null, Buffer.from(document), privateKey).toString("base64"),
    });

    expect(await new NodeCryptoVerifier().verifySignature(keyRequest(publicKey))).toEqual({ ok: true });
  });

  it("rejects a document changed after signing", async () => {
    root = makeTempDir();
    const { publicKey, privateKey } = generateKeyPairSync("ec", { namedCurve: "P-256", ...PEM_ENCODING });
    const signature = sign("sha256", Buffer.from(document), privateKey);
    writeFiles(root, { "main.attestation.json": document + " ", "main.attestation.sig": signature.toString("base64") });

    expect(await new NodeCryptoVerifier().verifySignature(keyRequest(publicKey))).toEqual({
      ok: false,
      reason: "invalid",
      detail: "signature does not match document and key",
    });
  });

  it("rejects a signature from another key", async () => {
    root = makeTempDir();
    const signer = generateKeyPairSync("ec", { namedCurve: "P-256", ...PEM_ENCODING });
    const other = generateKeyPairSync("ec", { namedCurve: "P-256", ...PEM_ENCODING });
    writeFiles(root, {
      "main.attestation.json": document,
      "main.attestation.sig": sign("sha256", Buffer.from(document), signer.privateKey).toString("base64"),
    });

    const outcome = await new NodeCryptoVerifier().verifySignature(keyRequest(other.publicKey));
    expect(outcome).toMatchObject({ ok: false, reason: "invalid" });
  });

  it("reports an unusable key as unavailable", async () => {
    root = makeTempDir();
    writeFiles(root, { "main.attestation.json": document, "main.attestation.sig": "c2ln" });

    const outcome = await new NodeCryptoVerifier().verifySignature(
      keyRequest("-----BEGIN PUBLIC KEY-----\nnot-a-key\n-----END PUBLIC KEY-----\n"),
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.reason).toBe("unavailable");
      expect(outcome.detail.startsWith("unusable public key:")).toBe(true);
    }
  });

  it("does not handle certificate identities", async () => {
    root = makeTempDir();

    const outcome = await new NodeCryptoVerifier().verifySignature({
      documentPath: path.join(root, "main.attestation.json"),
      signaturePath: path.join(root, "main.attestation.sig"),
      mode: {
        kind: "certificate",
        certificatePath: path.join(root, "main.attestation.cert"),
        identity: { identityRegexp: ".*", issuerRegexp: ".*", insecure: true },
      },
    });

    expect(outcome).toMatchObject({ ok: false, reason: "unavailable" });
  });
});
