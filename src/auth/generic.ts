import { ConfigurationError } from "../errors.js";

export const GENERIC_OIDC_TOKEN_VARIABLE = "FLAKEHUB_PUSH_OIDC_TOKEN";

export function readGenericOidcToken(env: NodeJS.ProcessEnv): string {
  const token = env[GENERIC_OIDC_TOKEN_VARIABLE];
  if (!token) {
    throw new ConfigurationError(`missing ${GENERIC_OIDC_TOKEN_VARIABLE} environment variable`);
  }
  return token;
}
