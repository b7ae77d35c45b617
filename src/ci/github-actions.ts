import { randomUUID } from "node:crypto";
import fs from "node:fs";
import type { PushError } from "../errors.js";

/** One `key<<delimiter` block of a GITHUB_OUTPUT file. */
export function formatOutput(key: string, value: string, delimiter: string): string {
  return `${key}<<${delimiter}\n${value}\n${delimiter}\n`;
}

/** Step outputs describing the release that was pushed (or already existed). */
export function releaseOutputs(uploadName: string, version: string): Record<string, string> {
  return {
    flake_name: uploadName,
    flake_version: version,
    flakeref_descriptive: `${uploadName}/${version}`,
    flakeref_exact: `${uploadName}/=${version}`,
  };
}

/** Append step outputs to the file GitHub Actions names in GITHUB_OUTPUT. */
export function writeGithubOutputs(filePath: string, outputs: Record<string, string>, newId: () => string = randomUUID): void {
  let text = "";
  for (const [key, value] of Object.entries(outputs)) {
    text += formatOutput(key, value, `ghadelimiter_${newId()}`);
  }
  fs.appendFileSync(filePath, text, "utf8");
}

function escapeAnnotation(message: string): string {
  return message.replace(/%/g, "%25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

/** A single-line `::error::` workflow command for errors worth surfacing inline. */
export function annotationFor(err: PushError): string | undefined {
  switch (err.kind) {
    case "unauthorized":
    case "conflict":
    case "bad_request":
      return `::error::${escapeAnnotation(err.message)}`;
    default:
      return undefined;
  }
}
