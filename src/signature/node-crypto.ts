import { createPublicKey, verify, type KeyObject } from "node:crypto";
import fs from "node:fs";
import { errorMessage } from "../core/finding.js";
import type { SignatureVerifier, VerifyOutcome, VerifyRequest } from "./verifier.js";

const BASE64_TEXT = /^[A-Za-z0-9+/=\r\n]+$/;

/** cosign writes base64 text; raw DER signatures are accepted as-is. */
export function decodeSignature(raw: Buffer): Buffer {
  const text = raw.toString("utf8").trim();
  if (text.length > 0 && BASE64_TEXT.test(text)) return Buffer.from(text, "base64");
  return raw;
}

/**
 * In-process verification of key-based blob signatures (ECDSA, RSA or
 * Ed25519 over the document bytes). Certificate identity policies need
 * the Fulcio extensions and the transparency log, so certificate mode is
 * reported as unavailable.
 */
export class NodeCryptoVerifier implements SignatureVerifier {
  readonly name = "builtin";

  async verifySignature(req: VerifyRequest): Promise<VerifyOutcome> {
    if (req.mode.kind !== "key") {
      return {
        ok: false,
        reason: "unavailable",
        detail: "builtin verifier supports public-key verification only; configure signature.verifier: cosign",
      };
    }

    let key: KeyObject;
    try {
      key = createPublicKey(req.mode.publicKeyPem);
    } catch (e) {
      return { ok: false, reason: "unavailable", detail: `unusable public key: ${errorMessage(e)}` };
    }

    let data: Buffer;
    let signature: Buffer;
    try {
      data = fs.readFileSync(req.documentPath);
      signature = decodeSignature(fs.readFileSync(req.signaturePath));
    } catch (e) {
      return { ok: false, reason: "unavailable", detail: errorMessage(e) };
    }

    // Ed25519 hashes internally and takes no digest name.
    const algorithm = key.asymmetricKeyType === "ed25519" ? null : "sha256";
    try {
      return verify(algorithm, data, key, signature)
        ? { ok: true }
        : { ok: false, reason: "invalid", detail: "signature does not match document and key" };
    } catch (e) {
      return { ok: false, reason: "invalid", detail: errorMessage(e) };
    }
  }
}
