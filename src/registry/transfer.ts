import { TransportError } from "../errors.js";
import { USER_AGENT, type HttpClient } from "../http/client.js";
import type { Tarball } from "../release/tarball.js";

/** PUT the tarball to the presigned URL returned by staging. */
export async function transferTarball(http: HttpClient, uploadUrl: string, tarball: Tarball): Promise<void> {
  const response = await http.fetch(uploadUrl, {
    method: "PUT",
    headers: {
      "Content-Length": String(tarball.bytes.length),
      "x-amz-checksum-sha256": tarball.hashBase64,
      "Content-Type": "application/gzip",
      "User-Agent": USER_AGENT,
    },
    body: tarball.bytes,
  });
  if (!response.ok) {
    throw new TransportError(`Got ${response.status} status from PUT request`);
  }
}
