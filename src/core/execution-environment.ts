export type ExecutionEnvironment = "github" | "gitlab" | "generic" | "local";

/** Variables whose presence selects an environment, checked in this order. */
export const ENVIRONMENT_MARKERS = [
  ["GITHUB_ACTION", "github"],
  ["GITLAB_CI", "gitlab"],
  ["FLAKEHUB_PUSH_OIDC_TOKEN", "generic"],
] as const;

/**
 * Pure function: classify the process environment. First marker wins;
 * combinations of markers are not validated.
 */
export function classifyExecutionEnvironment(env: NodeJS.ProcessEnv): ExecutionEnvironment {
  for (const [variable, environment] of ENVIRONMENT_MARKERS) {
    const value = env[variable];
    if (value !== undefined && value !== "") return environment;
  }
  return "local";
}
