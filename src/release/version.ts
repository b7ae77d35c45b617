import semver from "semver";
import { ConfigurationError } from "../errors.js";

export const DEFAULT_ROLLING_PREFIX = "0.1";

export type VersionInputs = {
  tag?: string;
  rolling: boolean;
  rollingMinor?: number;
  /** Needed only for rolling releases. */
  commitCount?: number;
  revision: string;
};

/** Either a rolling prefix that gets a commit suffix, or a tag used verbatim. */
export type VersionSource = { kind: "rolling"; prefix: string } | { kind: "tag"; tag: string };

export function versionSource(inputs: Pick<VersionInputs, "tag" | "rolling" | "rollingMinor">): VersionSource {
  const { tag, rolling, rollingMinor } = inputs;
  if (rollingMinor !== undefined) {
    if (!rolling) {
      throw new ConfigurationError("You must enable `rolling` to upload a release with a specific `rolling-minor`.");
    }
    return { kind: "rolling", prefix: `0.${rollingMinor}` };
  }
  if (rolling) return { kind: "rolling", prefix: DEFAULT_ROLLING_PREFIX };
  if (tag !== undefined) {
    const versionOnly = tag.startsWith("v") ? tag.slice(1) : tag;
    // semver.valid also takes a second `v`, a leading `=` and surrounding whitespace.
    if (/^[v=]/.test(versionOnly) || versionOnly !== versionOnly.trim() || semver.valid(versionOnly) === null) {
      throw new ConfigurationError(`Failed to parse version \`${tag}\` as semver, see https://semver.org/ for specifications`);
    }
    return { kind: "tag", tag };
  }
  throw new ConfigurationError(
    "Could not determine tag or rolling minor version, `--tag`, `GITHUB_REF_NAME`, or `--rolling-minor` must be set",
  );
}

/**
 * Release version: `{prefix}.{commitCount}+rev-{revision}` for rolling
 * releases, otherwise the tag exactly as given (leading `v` kept).
 */
export function resolveReleaseVersion(inputs: VersionInputs): string {
  const source = versionSource(inputs);
  if (source.kind === "tag") return source.tag;
  if (inputs.commitCount === undefined) {
    throw new ConfigurationError(
      `Could not determine the commit count of revision ${inputs.revision}, which rolling releases need; fetch the full history (for example \`fetch-depth: 0\`)`,
    );
  }
  return `${source.prefix}.${inputs.commitCount}+rev-${inputs.revision}`;
}
