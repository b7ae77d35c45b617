import { TransportError } from "../errors.js";
import { USER_AGENT, type HttpClient } from "../http/client.js";
import type { Logger } from "../log/logger.js";

export type DevClaims = {
  aud: string;
  iss: string;
  repository: string;
  repository_owner: string;
  repository_id: string;
  repository_owner_id: string;
};

export type LocalDevIdentity = {
  jwtIssuerUri: string;
  projectOwner: string;
  repository: string;
  projectId: number;
  ownerId: number;
};

export function buildDevClaims(identity: LocalDevIdentity): DevClaims {
  return {
    aud: "flakehub-localhost",
    iss: "flakehub-push-dev",
    repository: identity.repository,
    repository_owner: identity.projectOwner,
    repository_id: String(identity.projectId),
    repository_owner_id: String(identity.ownerId),
  };
}

export function tokenEndpoint(jwtIssuerUri: string): string {
  return `${jwtIssuerUri.replace(/\/+$/, "")}/token`;
}

/** The issuer answers with the bare token, or with `{ "token": ... }`. */
export function extractIssuedToken(body: string): string {
  const trimmed = body.trim();
  if (trimmed.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed !== null && typeof parsed === "object" && "token" in parsed && typeof parsed.token === "string") {
        return parsed.token;
      }
    } catch (err) {
      throw new TransportError("Getting token from JWT issuer's response", { cause: err });
    }
  }
  return trimmed;
}

/** Ask a development issuer to sign a claim set that mimics a GitHub Actions token. */
export async function mintLocalDevToken(http: HttpClient, identity: LocalDevIdentity, logger: Logger): Promise<string> {
  logger.warn("DEV_JWT", "running outside GitHub/GitLab - minting a dev-signed JWT");
  const claims = buildDevClaims(identity);
  logger.debug("DEV_JWT_CLAIMS", "Development claims", { claims });

  const response = await http.fetch(tokenEndpoint(identity.jwtIssuerUri), {
    method: "POST",
    headers: { "Content-Type": "application/json", "User-Agent": USER_AGENT },
    body: JSON.stringify(claims),
  });

  const body = await response.text();
  if (!response.ok) {
    throw new TransportError(`Status ${response.status} from JWT issuer\n${body}`);
  }

  const token = extractIssuedToken(body);
  if (token.length === 0) {
    throw new TransportError("JWT issuer returned an empty token");
  }
  return token;
}
