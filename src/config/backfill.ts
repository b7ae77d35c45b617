import type { ExecutionEnvironment } from "../core/execution-environment.js";
import type { PushConfig } from "../types/config.js";

type Backfill = Partial<Pick<PushConfig, "git_root" | "repository" | "tag" | "github_token">>;

function present(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

function fromGithub(env: NodeJS.ProcessEnv): Backfill {
  return {
    git_root: present(env.GITHUB_WORKSPACE),
    repository: present(env.GITHUB_REPOSITORY),
    // GITHUB_REF_NAME is a branch name on push events; only a tag ref names a release.
    tag: env.GITHUB_REF_TYPE === "tag" ? present(env.GITHUB_REF_NAME) : undefined,
    github_token: present(env.GITHUB_TOKEN),
  };
}

function fromGitlab(env: NodeJS.ProcessEnv): Backfill {
  return {
    git_root: present(env.CI_PROJECT_DIR),
    repository: present(env.CI_PROJECT_PATH),
    tag: present(env.CI_COMMIT_TAG),
  };
}

/**
 * Fill config values the user left blank from the CI platform's own variables.
 * Runs once, before any resolver; explicit values always win.
 */
export function backfillConfig(config: PushConfig, environment: ExecutionEnvironment, env: NodeJS.ProcessEnv): PushConfig {
  let fill: Backfill;
  switch (environment) {
    case "github":
      fill = fromGithub(env);
      break;
    case "gitlab":
      fill = fromGitlab(env);
      break;
    default:
      return config;
  }

  return {
    ...config,
    git_root: config.git_root ?? fill.git_root,
    repository: config.repository ?? fill.repository,
    tag: config.tag ?? fill.tag,
    github_token: config.github_token ?? fill.github_token,
  };
}
