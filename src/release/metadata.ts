import type { VisibilityInput } from "../types/config.js";

/** Visibility as the registry understands it; `hidden` is an older name for `unlisted`. */
export type Visibility = "public" | "unlisted" | "private";

export function normalizeVisibility(input: VisibilityInput): Visibility {
  return input === "hidden" ? "unlisted" : input;
}

/** Body of the stage request. Keys are the registry's wire names. */
export type ReleaseMetadata = {
  commit_count: number;
  description?: string;
  outputs: unknown;
  raw_flake_metadata: unknown;
  readme?: string;
  repo: string;
  revision: string;
  visibility: Visibility;
  mirrored: boolean;
  source_subdirectory?: string;
  spdx_identifier?: string;
  labels: string[];
};

export type ReleaseMetadataInputs = {
  uploadName: string;
  revision: string;
  commitCount: number;
  flakeMetadata: unknown;
  outputs: unknown;
  readme?: string;
  visibility: VisibilityInput;
  mirrored: boolean;
  sourceSubdirectory?: string;
  spdxIdentifier?: string;
  labels: string[];
};

/** `description` from `nix flake metadata --json`, when it is a string. */
export function flakeDescription(flakeMetadata: unknown): string | undefined {
  if (flakeMetadata === null || typeof flakeMetadata !== "object" || !("description" in flakeMetadata)) return undefined;
  return typeof flakeMetadata.description === "string" ? flakeMetadata.description : undefined;
}

export function buildReleaseMetadata(inputs: ReleaseMetadataInputs): ReleaseMetadata {
  const metadata: ReleaseMetadata = {
    commit_count: inputs.commitCount,
    outputs: inputs.outputs,
    raw_flake_metadata: inputs.flakeMetadata,
    repo: inputs.uploadName,
    revision: inputs.revision,
    visibility: normalizeVisibility(inputs.visibility),
    mirrored: inputs.mirrored,
    labels: [...inputs.labels],
  };
  const description = flakeDescription(inputs.flakeMetadata);
  if (description !== undefined) metadata.description = description;
  if (inputs.readme !== undefined) metadata.readme = inputs.readme;
  if (inputs.sourceSubdirectory !== undefined) metadata.source_subdirectory = inputs.sourceSubdirectory;
  if (inputs.spdxIdentifier !== undefined) metadata.spdx_identifier = inputs.spdxIdentifier;
  return Object.freeze(metadata);
}
