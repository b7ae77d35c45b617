import path from "node:path";
import { checkIssuerForEnvironment, createTokenContext, type TokenContext } from "../auth/token-context.js";
import type { ExecutionEnvironment } from "../core/execution-environment.js";
import { ConfigurationError, withOperation } from "../errors.js";
import type { FlakePackager } from "../flake/packager.js";
import { withTempDir } from "../flake/temp-dir.js";
import type { GitCommandRunner } from "../git/operations.js";
import { resolveRevisionInfo, type RevisionInfo } from "../git/revision-info.js";
import { fetchRepositoryData, type GithubRepositoryData } from "../github/graphql.js";
import type { HttpClient } from "../http/client.js";
import type { Logger } from "../log/logger.js";
import type { PushConfig } from "../types/config.js";
import { mergeLabels } from "./labels.js";
import { buildReleaseMetadata, type ReleaseMetadata } from "./metadata.js";
import { determineNames, type ReleaseNames } from "./names.js";
import { checkGithubSpdxIdentifier, checkSpdxExpression } from "./spdx.js";
import type { Tarball } from "./tarball.js";
import { resolveReleaseVersion } from "./version.js";

/** Everything a publish needs, built once and never mutated. */
export type ReleaseContext = Readonly<{
  host: string;
  environment: ExecutionEnvironment;
  tokenContext: TokenContext;
  names: ReleaseNames;
  version: string;
  errorOnConflict: boolean;
  metadata: ReleaseMetadata;
  tarball: Tarball;
}>;

/** Revision, license and topics after merging local git with the hosting platform. */
export type GitContext = {
  revisionInfo: RevisionInfo;
  spdxExpression?: string;
  topics: string[];
};

export type AssembleDeps = {
  env: NodeJS.ProcessEnv;
  http: HttpClient;
  logger: Logger;
  packager: FlakePackager;
  git?: GitCommandRunner;
  cwd?: string;
};

/** Resolve the flake directory under the git root; it may not escape it. */
export function resolveFlakeDirectory(gitRoot: string, directory: string): { flakeDir: string; subdirectory?: string } {
  const flakeDir = path.resolve(gitRoot, directory);
  const relative = path.relative(gitRoot, flakeDir);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new ConfigurationError(`The flake directory ${flakeDir} must be inside the Git root ${gitRoot}`);
  }
  return relative === "" ? { flakeDir } : { flakeDir, subdirectory: relative.split(path.sep).join("/") };
}

/**
 * Prefer the user's SPDX expression, warning when GitHub reports a different one.
 * GitHub's identifier is validated only when it is used.
 */
export function gitContextFromGithub(config: PushConfig, data: GithubRepositoryData, local: RevisionInfo, logger: Logger): GitContext {
  let spdxExpression: string | undefined;
  if (config.spdx_expression === undefined) {
    if (data.spdxIdentifier !== undefined) {
      logger.debug("SPDX_FROM_GITHUB", `Received SPDX identifier \`${data.spdxIdentifier}\` from GitHub API`);
      spdxExpression = checkGithubSpdxIdentifier(data.spdxIdentifier);
    }
  } else {
    if (config.spdx_expression !== data.spdxIdentifier) {
      logger.warn(
        "SPDX_MISMATCH",
        `SPDX identifier \`${config.spdx_expression}\` was passed via argument, but GitHub's API suggests it may be \`${data.spdxIdentifier ?? "None"}\``,
      );
    }
    spdxExpression = checkSpdxExpression(config.spdx_expression);
  }

  if (local.commitCount !== undefined && local.commitCount !== data.revCount) {
    logger.debug("COMMIT_COUNT_SOURCE", `Using GitHub's commit count ${data.revCount} over the local count ${local.commitCount}`);
  }

  return {
    revisionInfo: { revision: config.rev ?? data.revision, commitCount: data.revCount },
    spdxExpression,
    topics: data.topics,
  };
}

export function gitContextFromLocal(config: PushConfig, local: RevisionInfo): GitContext {
  return {
    revisionInfo: { revision: config.rev ?? local.revision, commitCount: local.commitCount },
    spdxExpression: config.spdx_expression === undefined ? undefined : checkSpdxExpression(config.spdx_expression),
    topics: [],
  };
}

/**
 * Turns a validated, backfilled config into a
 * ReleaseContext. The bearer token is not acquired here; the returned
 * TokenContext is consumed after packaging.
 */
export async function assembleReleaseContext(
  config: PushConfig,
  environment: ExecutionEnvironment,
  deps: AssembleDeps,
): Promise<ReleaseContext> {
  const { env, http, logger } = deps;
  const host = new URL(config.host);

  checkIssuerForEnvironment(environment, config.jwt_issuer_uri);

  // CI token contexts need nothing resolved below, so their secrets are checked first.
  let tokenContext: TokenContext | undefined =
    environment === "local" ? undefined : createTokenContext({ environment, host, env });

  if (!config.repository) {
    throw new ConfigurationError(
      "Could not determine repository name, pass `--repository` formatted like `determinatesystems/flakehub-push`",
    );
  }
  const repository = config.repository;
  const names = determineNames(config.name, repository, config.disable_rename_subgroups);

  const gitRoot = path.resolve(deps.cwd ?? process.cwd(), config.git_root ?? ".");
  const { flakeDir, subdirectory } = resolveFlakeDirectory(gitRoot, config.directory);
  const localRevision = await resolveRevisionInfo(gitRoot, { git: deps.git, logger });

  let gitContext: GitContext;
  if (environment === "github" || environment === "local") {
    if (!config.github_token) {
      throw new ConfigurationError("A GitHub token is required to query repository data; pass `--github-token` or set FLAKEHUB_PUSH_GITHUB_TOKEN");
    }
    const token = config.github_token;
    const data = await withOperation("github-graphql", () =>
      fetchRepositoryData(http, {
        token,
        owner: names.projectOwner,
        name: names.projectName,
        revision: config.rev ?? localRevision.revision,
      }),
    );
    gitContext = gitContextFromGithub(config, data, localRevision, logger);

    if (environment === "local") {
      tokenContext = createTokenContext({
        environment,
        host,
        env,
        jwtIssuerUri: config.jwt_issuer_uri,
        local: { projectOwner: names.projectOwner, repository, repositoryData: data },
      });
    }
  } else {
    gitContext = gitContextFromLocal(config, localRevision);
  }

  if (tokenContext === undefined) {
    throw new ConfigurationError("can't determine execution environment");
  }

  const { revision, commitCount } = gitContext.revisionInfo;
  const version = resolveReleaseVersion({
    tag: config.tag,
    rolling: config.rolling,
    rollingMinor: config.rolling_minor,
    commitCount,
    revision,
  });
  if (commitCount === undefined) {
    throw new ConfigurationError(
      `Could not determine the commit count of revision ${revision}; fetch the full history (for example \`fetch-depth: 0\`)`,
    );
  }

  const labels = mergeLabels(
    { extraLabels: config.extra_labels, extraTags: config.extra_tags, topics: gitContext.topics },
    logger,
  );

  logger.info("PREPARING", `Preparing release of ${names.uploadName}/${version}`);

  const packaged = await withOperation("package", () =>
    withTempDir("flakehub_push", (workDir) =>
      deps.packager.package({ flakeDir, workDir, includeOutputPaths: config.include_output_paths }),
    ),
  );

  const metadata = buildReleaseMetadata({
    uploadName: names.uploadName,
    revision,
    commitCount,
    flakeMetadata: packaged.metadata,
    outputs: packaged.outputs,
    readme: packaged.readme,
    visibility: config.visibility,
    mirrored: config.mirror,
    sourceSubdirectory: subdirectory,
    spdxIdentifier: gitContext.spdxExpression,
    labels,
  });

  return Object.freeze({
    host: config.host,
    environment,
    tokenContext,
    names,
    version,
    errorOnConflict: config.error_on_conflict,
    metadata,
    tarball: packaged.tarball,
  });
}
