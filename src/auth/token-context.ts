import type { ExecutionEnvironment } from "../core/execution-environment.js";
import { ConfigurationError, withOperation } from "../errors.js";
import type { GithubRepositoryData } from "../github/graphql.js";
import type { HttpClient } from "../http/client.js";
import type { Logger } from "../log/logger.js";
import { readGenericOidcToken } from "./generic.js";
import { getActionsIdBearerToken, requireActionsIdTokenSecrets } from "./github.js";
import { readGitlabIdToken } from "./gitlab.js";
import { mintLocalDevToken } from "./local-dev.js";

/**
 * Everything needed to obtain a bearer token later, after packaging.
 * Building one performs no I/O.
 */
export type TokenContext =
  | { kind: "github"; host: URL }
  | { kind: "gitlab" }
  | { kind: "generic" }
  | {
      kind: "local";
      jwtIssuerUri: string;
      projectOwner: string;
      repository: string;
      repositoryData: Pick<GithubRepositoryData, "projectId" | "ownerId">;
    };

export type TokenContextInput = {
  environment: ExecutionEnvironment;
  host: URL;
  env: NodeJS.ProcessEnv;
  jwtIssuerUri?: string;
  /** Required for local runs; the dev claims carry GitHub's ids. */
  local?: {
    projectOwner: string;
    repository: string;
    repositoryData: Pick<GithubRepositoryData, "projectId" | "ownerId">;
  };
};

/** Reject issuer/environment combinations that cannot produce a token. */
export function checkIssuerForEnvironment(environment: ExecutionEnvironment, jwtIssuerUri: string | undefined): void {
  if (environment === "local") {
    if (!jwtIssuerUri) {
      throw new ConfigurationError(
        "can't determine execution environment: not running in GitHub Actions, GitLab CI or with FLAKEHUB_PUSH_OIDC_TOKEN, and no `--jwt-issuer-uri` was given",
      );
    }
    return;
  }
  if (jwtIssuerUri) {
    throw new ConfigurationError("specifying the jwt_issuer_uri when running in GitHub or GitLab is invalid");
  }
}

export function createTokenContext(input: TokenContextInput): TokenContext {
  checkIssuerForEnvironment(input.environment, input.jwtIssuerUri);

  switch (input.environment) {
    case "github":
      // Fail before packaging and before any request when the job lacks `id-token: write`.
      requireActionsIdTokenSecrets(input.env);
      return { kind: "github", host: input.host };
    case "gitlab":
      return { kind: "gitlab" };
    case "generic":
      return { kind: "generic" };
    case "local": {
      if (!input.jwtIssuerUri || !input.local) {
        throw new ConfigurationError("Local runs need `--jwt-issuer-uri` and repository data from GitHub");
      }
      return { kind: "local", jwtIssuerUri: input.jwtIssuerUri, ...input.local };
    }
  }
}

export type AcquireTokenDeps = {
  http: HttpClient;
  env: NodeJS.ProcessEnv;
  logger: Logger;
};

/** Obtain the bearer token for the registry. Errors carry the `acquire-token` operation. */
export async function acquireToken(ctx: TokenContext, deps: AcquireTokenDeps): Promise<string> {
  return withOperation("acquire-token", async () => {
    switch (ctx.kind) {
      case "github":
        return getActionsIdBearerToken(deps.http, deps.env, ctx.host);
      case "gitlab":
        return readGitlabIdToken(deps.env);
      case "generic":
        return readGenericOidcToken(deps.env);
      case "local":
        return mintLocalDevToken(
          deps.http,
          {
            jwtIssuerUri: ctx.jwtIssuerUri,
            projectOwner: ctx.projectOwner,
            repository: ctx.repository,
            projectId: ctx.repositoryData.projectId,
            ownerId: ctx.repositoryData.ownerId,
          },
          deps.logger,
        );
    }
  });
}
