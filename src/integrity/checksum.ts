import { createHash } from "node:crypto";
import fs from "node:fs";

const CHUNK_SIZE = 64 * 1024;

/** SHA-256 of a file's bytes, lowercase hex, read in fixed-size chunks. */
export function computeSha256(filePath: string): string {
  const hash = createHash("sha256");
  const fd = fs.openSync(filePath, "r");
  try {
    const buf = Buffer.alloc(CHUNK_SIZE);
    let read: number;
    while ((read = fs.readSync(fd, buf, 0, CHUNK_SIZE, null)) > 0) {
      hash.update(buf.subarray(0, read));
    }
  } finally {
    fs.closeSync(fd);
  }
  return hash.digest("hex");
}

export function digestsEqual(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.toLowerCase();
}
