import parseSpdx from "spdx-expression-parse";
import { ConfigurationError, errorMessage } from "../errors.js";

/** Whether `expression` is a valid SPDX license expression. */
export function isValidSpdxExpression(expression: string): boolean {
  try {
    parseSpdx(expression);
    return true;
  } catch {
    return false;
  }
}

/** Check an SPDX expression given by the user. */
export function checkSpdxExpression(expression: string): string {
  try {
    parseSpdx(expression);
  } catch (err) {
    throw new ConfigurationError(`Invalid SPDX expression \`${expression}\`: ${errorMessage(err)}`, { cause: err });
  }
  return expression;
}

/** Check the SPDX identifier GitHub reports for a repository. */
export function checkGithubSpdxIdentifier(identifier: string): string {
  if (!isValidSpdxExpression(identifier)) {
    throw new ConfigurationError(
      `Invalid SPDX license identifier \`${identifier}\` reported from the GitHub API, either you are using a non-standard license or GitHub has returned a value that cannot be validated; pass \`--spdx-expression\` to override it`,
    );
  }
  return identifier;
}
