import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { RegistryClient } from "../src/registry/client.js";
import { PublishProtocol } from "../src/registry/protocol.js";
import { isTerminal, nextPublishState } from "../src/registry/state-machine.js";
import { buildReleaseMetadata } from "../src/release/metadata.js";
import { makeTarball } from "../src/release/tarball.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import { createMemoryLogger, createMockHttpClient, jsonResponse, textResponse } from "./helpers/mocks.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");
const HOST = "https://registry.example.test";
const UPLOAD = "https://s3.example.test/put";
const TARBALL = makeTarball(Buffer.from("test-tarball"));
const STAGE_URL = `${HOST}/upload/example-org/example-flake/v1.0.0/${TARBALL.bytes.length}/${TARBALL.hashBase64}`;

const REQUEST = {
  uploadName: "example-org/example-flake",
  version: "v1.0.0",
  metadata: buildReleaseMetadata({
    uploadName: "example-org/example-flake",
    revision: "abc123",
    commitCount: 3,
    flakeMetadata: {},
    outputs: {},
    visibility: "public",
    mirrored: false,
    labels: [],
  }),
  tarball: TARBALL,
};

describe("publish state machine", () => {
  const lenient = { errorOnConflict: false };
  const strict = { errorOnConflict: true };

  it("walks the happy path", () => {
    expect(nextPublishState("built", "staged", lenient)).toBe("staged");
    expect(nextPublishState("staged", "transferred", lenient)).toBe("transferred");
    expect(nextPublishState("transferred", "published", lenient)).toBe("published");
  });

  it("splits conflicts by strictness", () => {
    expect(nextPublishState("built", "conflict", lenient)).toBe("skipped");
    expect(nextPublishState("built", "conflict", strict)).toBe("conflicted");
  });

  it("fails on out-of-order events and from terminal states", () => {
    expect(nextPublishState("built", "published", lenient)).toBe("failed");
    expect(nextPublishState("staged", "conflict", lenient)).toBe("failed");
    expect(nextPublishState("published", "staged", lenient)).toBe("failed");
    expect(nextPublishState("transferred", "failure", lenient)).toBe("failed");
  });

  it("knows its terminal states", () => {
    expect(isTerminal("skipped")).toBe(true);
    expect(isTerminal("staged")).toBe(false);
  });
});

describe("PublishProtocol", () => {
  let schemas: SchemaRegistry;

  beforeAll(async () => {
    schemas = await createRegistry(SCHEMA_DIR);
  });

  function setup(routes: Parameters<typeof createMockHttpClient>[0], errorOnConflict = false) {
    const http = createMockHttpClient(routes);
    const logger = createMemoryLogger();
    const client = new RegistryClient({ host: HOST, token: "test-secret", http, schemas });
    return { http, logger, protocol: new PublishProtocol({ client, http, logger, errorOnConflict }) };
  }

  it("stages, transfers and publishes in order", async () => {
    const { http, logger, protocol } = setup({
      [`POST ${STAGE_URL}`]: jsonResponse({ s3_upload_url: UPLOAD, uuid: "r-1" }),
      [`PUT ${UPLOAD}`]: textResponse(""),
      [`POST ${HOST}/publish/r-1`]: textResponse(""),
    });
    expect(await protocol.run(REQUEST)).toEqual({ state: "published", releaseId: "r-1" });
    expect(http.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `POST ${STAGE_URL}`,
      `PUT ${UPLOAD}`,
      `POST ${HOST}/publish/r-1`,
    ]);
    expect(protocol.history).toEqual(["built", "staged", "transferred", "published"]);
    expect(logger.messages("info")).toEqual(["Successfully released new version of example-org/example-flake/v1.0.0"]);
  });

  it("skips an existing release when conflicts are allowed", async () => {
    const { http, logger, protocol } = setup({ [`POST ${STAGE_URL}`]: textResponse("", 409) });
    expect(await protocol.run(REQUEST)).toEqual({ state: "skipped" });
    expect(http.requests).toHaveLength(1);
    expect(protocol.history).toEqual(["built", "skipped"]);
    expect(logger.messages("info")).toEqual([
      "Release for revision `abc123` of example-org/example-flake/v1.0.0 already exists; flakehub-push will not upload it again",
    ]);
  });

  it("fails on an existing release when conflicts are errors", async () => {
    const { http, protocol } = setup({ [`POST ${STAGE_URL}`]: textResponse("", 409) }, true);
    await expect(protocol.run(REQUEST)).rejects.toMatchObject({
      kind: "conflict",
      message: "example-org/example-flake/v1.0.0 already exists",
    });
    expect(http.requests).toHaveLength(1);
    expect(protocol.history).toEqual(["built", "conflicted"]);
  });

  it("stops after a failed transfer", async () => {
    const { http, protocol } = setup({
      [`POST ${STAGE_URL}`]: jsonResponse({ s3_upload_url: UPLOAD, uuid: "r-1" }),
      [`PUT ${UPLOAD}`]: textResponse("denied", 403),
    });
    await expect(protocol.run(REQUEST)).rejects.toMatchObject({
      kind: "transport",
      message: "transfer: Got 403 status from PUT request",
      operations: ["transfer"],
    });
    expect(http.requests.map((r) => r.method)).toEqual(["POST", "PUT"]);
    expect(protocol.history).toEqual(["built", "staged", "failed"]);
  });

  it("tags stage failures with the operation", async () => {
    const { protocol } = setup({ [`POST ${STAGE_URL}`]: textResponse("expired", 401) });
    await expect(protocol.run(REQUEST)).rejects.toMatchObject({
      kind: "unauthorized",
      message: "stage: Unauthorized: expired",
    });
    expect(protocol.history).toEqual(["built", "failed"]);
  });
});
