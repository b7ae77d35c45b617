import { TransportError } from "../errors.js";
import { USER_AGENT, type HttpClient } from "../http/client.js";

export const GITHUB_GRAPHQL_ENDPOINT = "https://api.github.com/graphql";
export const MAX_NUM_EXTRA_TOPICS = 20;

export const REPOSITORY_DATA_QUERY = `
query RepositoryData($owner: String!, $name: String!, $revision: GitObjectID!, $maxNumTopics: Int!) {
  repository(owner: $owner, name: $name) {
    databaseId
    owner {
      __typename
      ... on Organization { databaseId }
      ... on User { databaseId }
    }
    licenseInfo { spdxId }
    object(oid: $revision) {
      __typename
      ... on Commit { history { totalCount } }
    }
    repositoryTopics(first: $maxNumTopics) {
      edges { node { topic { name } } }
    }
  }
}
`;

export type GithubRepositoryData = {
  revision: string;
  revCount: number;
  spdxIdentifier?: string;
  projectId: number;
  ownerId: number;
  topics: string[];
};

export type RepositoryDataRequest = {
  token: string;
  owner: string;
  name: string;
  revision: string;
  endpoint?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function topicNames(edges: unknown): string[] {
  if (!Array.isArray(edges)) return [];
  const names: string[] = [];
  for (const edge of edges) {
    const name = field(field(field(edge, "node"), "topic"), "name");
    if (typeof name === "string") names.push(name);
  }
  return names;
}

/** Interpret the `data` of a RepositoryData response. */
export function parseRepositoryData(data: unknown, req: Pick<RepositoryDataRequest, "owner" | "name" | "revision">): GithubRepositoryData {
  const repository = field(data, "repository");
  if (!isRecord(repository)) {
    throw new TransportError(
      `Did not receive a \`repository\` from GitHub's GraphQL API. Does the repository ${req.owner}/${req.name} exist on GitHub, and does your GitHub access token have access to it?`,
    );
  }

  const object = repository.object;
  if (!isRecord(object)) {
    throw new TransportError(
      `Did not receive a \`repository.object\` from GitHub's GraphQL API. Is the current commit ${req.revision} pushed to GitHub?`,
    );
  }
  const revCount = field(field(object, "history"), "totalCount");
  if (object.__typename !== "Commit" || typeof revCount !== "number") {
    throw new TransportError("Retrieved a `repository.object` that was not a `Commit` from GitHub's GraphQL API");
  }

  const projectId = repository.databaseId;
  if (typeof projectId !== "number") {
    throw new TransportError("Did not receive a `repository.databaseId` from GitHub's GraphQL API");
  }
  const ownerId = field(repository.owner, "databaseId");
  if (typeof ownerId !== "number") {
    throw new TransportError("Did not receive a `repository.owner.databaseId` from GitHub's GraphQL API");
  }

  const spdx = field(repository.licenseInfo, "spdxId");

  return {
    revision: req.revision,
    revCount,
    spdxIdentifier: typeof spdx === "string" ? spdx : undefined,
    projectId,
    ownerId,
    topics: topicNames(field(repository.repositoryTopics, "edges")),
  };
}

/**
 * Fetch commit count, license, ids and topics of a repository at a revision
 * from GitHub's GraphQL API.
 */
export async function fetchRepositoryData(http: HttpClient, req: RepositoryDataRequest): Promise<GithubRepositoryData> {
  const response = await http.fetch(req.endpoint ?? GITHUB_GRAPHQL_ENDPOINT, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${req.token}`,
      "Content-Type": "application/json",
      "User-Agent": USER_AGENT,
    },
    body: JSON.stringify({
      query: REPOSITORY_DATA_QUERY,
      variables: { owner: req.owner, name: req.name, revision: req.revision, maxNumTopics: MAX_NUM_EXTRA_TOPICS },
    }),
  });

  if (response.status !== 200) {
    const body = await response.text();
    throw new TransportError(`Got ${response.status} status from GitHub's GraphQL API, expected 200\n${body}`);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw new TransportError("Failed to decode the response from GitHub's GraphQL API", { cause: err });
  }

  const data = field(payload, "data");
  if (!isRecord(data)) {
    throw new TransportError("Did not receive `data` in the response from GitHub's GraphQL API");
  }
  return parseRepositoryData(data, req);
}
