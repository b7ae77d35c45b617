import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { annotationFor, formatOutput, releaseOutputs, writeGithubOutputs } from "../src/ci/github-actions.js";
import { BadRequestError, ConfigurationError, ConflictError, TransportError, wrapError } from "../src/errors.js";

describe("GitHub Actions outputs", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "flakehub-push-gha-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("names the release four ways", () => {
    expect(releaseOutputs("example-org/example-flake", "v1.0.0")).toEqual({
      flake_name: "example-org/example-flake",
      flake_version: "v1.0.0",
      flakeref_descriptive: "example-org/example-flake/v1.0.0",
      flakeref_exact: "example-org/example-flake/=v1.0.0",
    });
  });

  it("formats a heredoc block", () => {
    expect(formatOutput("flake_name", "a/b", "ghadelimiter_x")).toBe("flake_name<<ghadelimiter_x\na/b\nghadelimiter_x\n");
  });

  it("appends every output with its own delimiter", () => {
    const file = path.join(tmpDir, "output");
    fs.writeFileSync(file, "existing=1\n");
    let n = 0;
    writeGithubOutputs(file, { flake_name: "a/b", flake_version: "v1.0.0" }, () => `id${++n}`);
    expect(fs.readFileSync(file, "utf8")).toBe(
      "existing=1\n" +
        "flake_name<<ghadelimiter_id1\na/b\nghadelimiter_id1\n" +
        "flake_version<<ghadelimiter_id2\nv1.0.0\nghadelimiter_id2\n",
    );
  });
});

describe("annotationFor", () => {
  it("annotates registry rejections on one line", () => {
    expect(annotationFor(new BadRequestError("line one\nline two 100%"))).toBe(
      "::error::Bad request: line one%0Aline two 100%25",
    );
    expect(annotationFor(wrapError("stage", new ConflictError("a/b", "v1.0.0")))).toBe("::error::stage: a/b/v1.0.0 already exists");
  });

  it("skips configuration and transport errors", () => {
    expect(annotationFor(new ConfigurationError("bad"))).toBeUndefined();
    expect(annotationFor(new TransportError("down"))).toBeUndefined();
  });
});
