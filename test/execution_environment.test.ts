import { describe, expect, it } from "vitest";
import { classifyExecutionEnvironment } from "../src/core/execution-environment.js";

describe("execution environment", () => {
  it("detects GitHub Actions", () => {
    expect(classifyExecutionEnvironment({ GITHUB_ACTION: "__run" })).toBe("github");
  });

  it("detects GitLab CI", () => {
    expect(classifyExecutionEnvironment({ GITLAB_CI: "true" })).toBe("gitlab");
  });

  it("detects a generic OIDC CI", () => {
    expect(classifyExecutionEnvironment({ FLAKEHUB_PUSH_OIDC_TOKEN: "test-token" })).toBe("generic");
  });

  it("falls back to a local run", () => {
    expect(classifyExecutionEnvironment({ HOME: "/home/dev" })).toBe("local");
  });

  it("first marker wins when several are present", () => {
    expect(classifyExecutionEnvironment({ GITLAB_CI: "true", GITHUB_ACTION: "__run" })).toBe("github");
    expect(classifyExecutionEnvironment({ FLAKEHUB_PUSH_OIDC_TOKEN: "t", GITLAB_CI: "true" })).toBe("gitlab");
  });

  it("treats empty markers as unset", () => {
    expect(classifyExecutionEnvironment({ GITHUB_ACTION: "", GITLAB_CI: "" })).toBe("local");
  });
});
