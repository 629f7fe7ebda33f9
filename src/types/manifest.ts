/** A declared file of the CDF manifest (cdf-meta.json). */
export type FileEntry = {
  /** Bundle-relative POSIX path. */
  path: string;
  expectedHash: string;
  signatureRef?: string;
};

/** Loaded manifest. Read-only for the rest of a run. */
export type Manifest = {
  /** File name of the manifest itself inside the bundle (its self entry). */
  fileName: string;
  version: string;
  pattern: string;
  files: readonly FileEntry[];
};
