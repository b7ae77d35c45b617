import { ConfigurationError, errorMessage } from "../errors.js";
import type { Logger } from "../log/logger.js";
import { GitOperations, type GitCommandRunner } from "./operations.js";

export type RevisionInfo = {
  revision: string;
  /** Undefined when local history cannot be walked, e.g. in a shallow clone. */
  commitCount: number | undefined;
};

/**
 * Resolve HEAD of the repository at `gitRoot` and count the commits behind it.
 */
export async function resolveRevisionInfo(gitRoot: string, opts: { git?: GitCommandRunner; logger?: Logger } = {}): Promise<RevisionInfo> {
  let ops: GitOperations;
  try {
    ops = new GitOperations(gitRoot, opts.git);
  } catch (err) {
    throw new ConfigurationError(`Could not open the Git repository at ${gitRoot}: ${errorMessage(err)}`, { cause: err });
  }

  let revision: string | undefined;
  try {
    const headTarget = await ops.symbolicRef("HEAD");
    if (headTarget !== undefined && (await ops.symbolicRef(headTarget)) !== undefined) {
      throw new ConfigurationError(
        "Symbolic revision pointing to a symbolic revision is not supported at this time",
      );
    }
    revision = await ops.resolveCommit("HEAD");
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Could not read HEAD of the Git repository at ${gitRoot}: ${errorMessage(err)}`, { cause: err });
  }

  if (revision === undefined) {
    throw new ConfigurationError("Newly initialized repository detected, at least one commit is necessary");
  }

  return { revision, commitCount: await countCommits(ops, revision, opts.logger) };
}

async function countCommits(ops: GitOperations, revision: string, logger?: Logger): Promise<number | undefined> {
  try {
    if (await ops.isShallow()) {
      logger?.debug("SHALLOW_CLONE", "Shallow clone; the local commit count is unavailable");
      return undefined;
    }
    return await ops.countCommits(revision);
  } catch (err) {
    logger?.debug("COMMIT_COUNT_FAILED", `Could not walk history from ${revision}: ${errorMessage(err)}`);
    return undefined;
  }
}
