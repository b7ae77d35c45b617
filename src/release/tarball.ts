import { createHash } from "node:crypto";

export type Tarball = {
  bytes: Buffer;
  /** Standard (padded) base64 of the SHA-256 digest of `bytes`. */
  hashBase64: string;
};

/** Compute SHA256 of a buffer as base64, the form the registry and S3 expect. */
export function computeSha256Base64(content: Buffer): string {
  return createHash("sha256").update(content).digest("base64");
}

export function makeTarball(bytes: Buffer): Tarball {
  return { bytes, hashBase64: computeSha256Base64(bytes) };
}
