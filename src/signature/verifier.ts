/**
 * Signature verification collaborator. The pipeline only sees this
 * interface; cosign, an in-process library or a remote service can sit
 * behind it.
 */

export type IdentityPolicy = {
  identityRegexp: string;
  issuerRegexp: string;
  /** Set when the policy was widened to any identity/issuer by explicit opt-in. */
  insecure: boolean;
};

export type TrustMaterial = {
  publicKeyPem?: string;
  identity?: IdentityPolicy;
};

export type VerificationMode =
  | { kind: "key"; publicKeyPem: string }
  | { kind: "certificate"; certificatePath: string; identity: IdentityPolicy };

export type VerifyRequest = {
  /** Absolute path of the signed document. */
  documentPath: string;
  /** Absolute path of the detached signature. */
  signaturePath: string;
  mode: VerificationMode;
};

export type VerifyOutcome =
  | { ok: true }
  | { ok: false; reason: "invalid" | "unavailable"; detail: string };

export interface SignatureVerifier {
  readonly name: string;
  verifySignature(req: VerifyRequest): Promise<VerifyOutcome>;
}
