/** Top-level fields of an in-toto style provenance statement (*.attestation.json). */
export const REQUIRED_ATTESTATION_FIELDS = ["_type", "subject", "predicateType", "predicate"] as const;

export type SignatureArtifact = {
  signaturePath: string;
  attestationPath: string;
  certificatePath?: string;
};
