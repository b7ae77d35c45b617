import type { LogSink, OutputFormat } from "../log/logger.js";
import type { PushResult } from "./push.js";

/**
 * Print the final line of a push run. Failures always go to stderr,
 * in either format.
 */
export function reportPushResult(res: PushResult, format: OutputFormat, stdout: LogSink, stderr: LogSink): void {
  if (!res.ok) {
    if (format === "jsonl") {
      stderr.write(JSON.stringify({ level: "error", code: res.error.kind.toUpperCase(), message: res.error.message }) + "\n");
    } else {
      stderr.write(`error: ${res.error.message}\n`);
    }
    return;
  }

  const release = `${res.uploadName}/${res.version}`;
  if (format === "jsonl") {
    stdout.write(JSON.stringify({ level: "info", code: "OK", release, outcome: res.outcome }) + "\n");
  } else if (res.outcome === "skipped") {
    stdout.write(`${release} already exists; nothing to do\n`);
  } else {
    stdout.write(`Published ${release}\n`);
  }
}
