import { ConfigurationError } from "../errors.js";

export const GITLAB_ID_TOKEN_VARIABLE = "GITLAB_JWT_ID_TOKEN";

/**
 * GitLab hands the job a pre-issued JWT through an `id_tokens` entry; the
 * registry checks its audience, so nothing is requested here.
 */
export function readGitlabIdToken(env: NodeJS.ProcessEnv): string {
  const token = env[GITLAB_ID_TOKEN_VARIABLE];
  if (!token) {
    throw new ConfigurationError(
      `Failed to get a JWT from GitLab. You must configure id_token in the jobs, eg:

id_tokens:
  ${GITLAB_ID_TOKEN_VARIABLE}:
    aud: "api.flakehub.com"`,
    );
  }
  return token;
}
