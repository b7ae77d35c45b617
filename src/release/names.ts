import { ConfigurationError } from "../errors.js";

export type ReleaseNames = {
  /** `owner/flake`, exactly one slash. */
  uploadName: string;
  projectOwner: string;
  projectName: string;
};

const REPOSITORY_HINT = "Could not determine project owner and name; pass `--repository` formatted like `determinatesystems/flakehub-push`";

function repositoryError(disableRenameSubgroups: boolean): ConfigurationError {
  if (disableRenameSubgroups) return new ConfigurationError(REPOSITORY_HINT);
  return new ConfigurationError(
    `${REPOSITORY_HINT} or \`determinatesystems/subgroup-segments.../flakehub-push\`)`,
  );
}

const NAME_ERROR =
  "The argument `--name` must be in the format of `owner-name/flake-name` and cannot contain whitespace or other special characters";

// Printable ASCII except space: whitespace and non-ASCII are rejected.
const UPLOAD_NAME_CHARS = /^[\x21-\x7e]+$/;

function isValidUploadName(name: string): boolean {
  const parts = name.split("/");
  return parts.length === 2 && parts.every((p) => p.length > 0) && UPLOAD_NAME_CHARS.test(name);
}

/**
 * Derive the upload name and the project's owner/name from `repository`.
 * Nested subgroups (`a/b/c`) are flattened into the project name (`b-c`)
 * unless `disableRenameSubgroups` is set, in which case they are an error.
 * The repository is validated before the explicit name.
 */
export function determineNames(explicitName: string | undefined, repository: string, disableRenameSubgroups: boolean): ReleaseNames {
  const [projectOwner, ...rest] = repository.split("/");
  if (!projectOwner || rest.length === 0 || rest.some((s) => s.length === 0)) {
    throw repositoryError(disableRenameSubgroups);
  }
  if (disableRenameSubgroups && rest.length !== 1) {
    throw repositoryError(disableRenameSubgroups);
  }
  const projectName = rest.join("-");

  let uploadName = `${projectOwner}/${projectName}`;
  if (!isValidUploadName(uploadName)) {
    throw repositoryError(disableRenameSubgroups);
  }
  if (explicitName !== undefined) {
    if (!isValidUploadName(explicitName)) {
      throw new ConfigurationError(NAME_ERROR);
    }
    uploadName = explicitName;
  }

  return { uploadName, projectOwner, projectName };
}
