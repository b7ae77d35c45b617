import { ConfigurationError, TransportError } from "../errors.js";
import { USER_AGENT, type HttpClient } from "../http/client.js";

export const ACTIONS_ID_TOKEN_PERMISSION_HINT = `\
No \`ACTIONS_ID_TOKEN_REQUEST_TOKEN\` found, \`flakehub-push\` requires a JWT. To provide this, add \`permissions\` to your job, eg:

# ...
jobs:
  example:
    runs-on: ubuntu-latest
    permissions:
      id-token: write # Authenticate against FlakeHub
      contents: read
    steps:
    - uses: actions/checkout@v4
    # ...`;

export type ActionsIdTokenSecrets = {
  requestToken: string;
  requestUrl: string;
};

/** Read the OIDC request secrets GitHub injects when the job has `id-token: write`. */
export function requireActionsIdTokenSecrets(env: NodeJS.ProcessEnv): ActionsIdTokenSecrets {
  const requestToken = env.ACTIONS_ID_TOKEN_REQUEST_TOKEN;
  if (!requestToken) {
    throw new ConfigurationError(ACTIONS_ID_TOKEN_PERMISSION_HINT);
  }
  const requestUrl = env.ACTIONS_ID_TOKEN_REQUEST_URL;
  if (!requestUrl) {
    throw new ConfigurationError(
      "`ACTIONS_ID_TOKEN_REQUEST_URL` required if `ACTIONS_ID_TOKEN_REQUEST_TOKEN` is also present",
    );
  }
  return { requestToken, requestUrl };
}

/** Request an Actions OIDC token whose audience is the registry's hostname. */
export async function getActionsIdBearerToken(http: HttpClient, env: NodeJS.ProcessEnv, host: URL): Promise<string> {
  const { requestToken, requestUrl } = requireActionsIdTokenSecrets(env);

  const response = await http.fetch(`${requestUrl}&audience=${host.hostname}`, {
    method: "GET",
    headers: {
      Authorization: `Bearer ${requestToken}`,
      "User-Agent": USER_AGENT,
    },
  });

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw new TransportError("Getting JSON from Actions ID bearer token response", { cause: err });
  }

  const value = payload !== null && typeof payload === "object" && "value" in payload ? payload.value : undefined;
  if (typeof value !== "string") {
    throw new TransportError("Getting value from Actions ID bearer token response");
  }
  return value;
}
