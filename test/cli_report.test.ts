import { describe, expect, it } from "vitest";
import { EXIT } from "../src/commands/exit-codes.js";
import { reportPushResult } from "../src/commands/report.js";
import { ConflictError } from "../src/errors.js";
import { createSink } from "./helpers/mocks.js";

const FAILED = { ok: false, error: new ConflictError("a/b", "v1.0.0"), exitCode: EXIT.RELEASE_CONFLICT } as const;

describe("reportPushResult", () => {
  it("writes a failure to stderr in human format", () => {
    const stdout = createSink();
    const stderr = createSink();
    reportPushResult(FAILED, "human", stdout, stderr);
    expect(stderr.chunks).toEqual(["error: a/b/v1.0.0 already exists\n"]);
    expect(stdout.chunks).toEqual([]);
  });

  it("writes a failure to stderr in jsonl format", () => {
    const stdout = createSink();
    const stderr = createSink();
    reportPushResult(FAILED, "jsonl", stdout, stderr);
    expect(stderr.chunks).toEqual(['{"level":"error","code":"CONFLICT","message":"a/b/v1.0.0 already exists"}\n']);
    expect(stdout.chunks).toEqual([]);
  });

  it("reports a published release on stdout", () => {
    const stdout = createSink();
    const stderr = createSink();
    reportPushResult({ ok: true, uploadName: "a/b", version: "v1.0.0", outcome: "published", releaseId: "r-1" }, "human", stdout, stderr);
    expect(stdout.chunks).toEqual(["Published a/b/v1.0.0\n"]);
    expect(stderr.chunks).toEqual([]);
  });

  it("reports a skipped release", () => {
    const stdout = createSink();
    reportPushResult({ ok: true, uploadName: "a/b", version: "v1.0.0", outcome: "skipped" }, "jsonl", stdout, createSink());
    expect(stdout.chunks).toEqual(['{"level":"info","code":"OK","release":"a/b/v1.0.0","outcome":"skipped"}\n']);
  });
});
