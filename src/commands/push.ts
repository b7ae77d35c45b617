import { acquireToken } from "../auth/token-context.js";
import { annotationFor, releaseOutputs, writeGithubOutputs } from "../ci/github-actions.js";
import { backfillConfig } from "../config/backfill.js";
import { loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { classifyExecutionEnvironment, type ExecutionEnvironment } from "../core/execution-environment.js";
import { ConfigurationError, PushError, wrapError, type PushErrorKind } from "../errors.js";
import { NixFlakePackager, type FlakePackager } from "../flake/packager.js";
import type { GitCommandRunner } from "../git/operations.js";
import { defaultHttpClient, type HttpClient } from "../http/client.js";
import { createLogger, type LogSink } from "../log/logger.js";
import { RegistryClient } from "../registry/client.js";
import { PublishProtocol } from "../registry/protocol.js";
import { assembleReleaseContext } from "../release/context.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type PushOpts = {
  /** Directory holding base.yaml. */
  configDir?: string;
  configFile?: string;
  schemaDir?: string;
  /** CLI flags keyed by config name. */
  flags?: RawConfig;
  env?: NodeJS.ProcessEnv;
  http?: HttpClient;
  packager?: FlakePackager;
  git?: GitCommandRunner;
  cwd?: string;
  stdout?: LogSink;
  stderr?: LogSink;
};

export type PushResult =
  | { ok: true; uploadName: string; version: string; outcome: "published" | "skipped"; releaseId?: string }
  | { ok: false; error: PushError; exitCode: ExitCode };

const EXIT_FOR_KIND: Record<PushErrorKind, ExitCode> = {
  configuration: EXIT.INVALID_ARGS,
  unauthorized: EXIT.UNAUTHORIZED,
  conflict: EXIT.RELEASE_CONFLICT,
  bad_request: EXIT.BAD_REQUEST,
  transport: EXIT.PUSH_FAILED,
};

function failure(err: unknown): { ok: false; error: PushError; exitCode: ExitCode } {
  const error = err instanceof PushError ? err : wrapError("push", err);
  return { ok: false, error, exitCode: EXIT_FOR_KIND[error.kind] };
}

/**
 * Push one release: resolve config and context, package the flake, then
 * acquire a token and run stage → transfer → publish.
 */
export async function push(opts: PushOpts = {}): Promise<PushResult> {
  const env = opts.env ?? process.env;
  const stdout = opts.stdout ?? process.stdout;
  const http = opts.http ?? defaultHttpClient;

  let environment: ExecutionEnvironment | undefined;
  try {
    const raw = loadConfig({ configDir: opts.configDir, configFile: opts.configFile, env, overrides: opts.flags });
    const validated = await validateConfig(raw, opts.schemaDir);
    if (!validated.ok) {
      return failure(new ConfigurationError(`Invalid configuration: ${validated.errors}`));
    }

    environment = classifyExecutionEnvironment(env);
    const config = backfillConfig(validated.config, environment, env);
    const logger = createLogger({ format: config.format, level: config.log_level, stdout, stderr: opts.stderr });
    logger.debug("ENVIRONMENT", `Detected execution environment: ${environment}`);

    const ctx = await assembleReleaseContext(config, environment, {
      env,
      http,
      logger,
      packager: opts.packager ?? new NixFlakePackager({ logger }),
      git: opts.git,
      cwd: opts.cwd,
    });

    const token = await acquireToken(ctx.tokenContext, { http, env, logger });
    const schemas = await createRegistry(opts.schemaDir);
    const protocol = new PublishProtocol({
      client: new RegistryClient({ host: ctx.host, token, http, schemas }),
      http,
      logger,
      errorOnConflict: ctx.errorOnConflict,
    });
    const outcome = await protocol.run({
      uploadName: ctx.names.uploadName,
      version: ctx.version,
      metadata: ctx.metadata,
      tarball: ctx.tarball,
    });

    const outputFile = env.GITHUB_OUTPUT;
    if (environment === "github" && outputFile) {
      writeGithubOutputs(outputFile, releaseOutputs(ctx.names.uploadName, ctx.version));
    }

    return outcome.state === "published"
      ? { ok: true, uploadName: ctx.names.uploadName, version: ctx.version, outcome: "published", releaseId: outcome.releaseId }
      : { ok: true, uploadName: ctx.names.uploadName, version: ctx.version, outcome: "skipped" };
  } catch (err) {
    const result = failure(err);
    if (environment === "github") {
      const annotation = annotationFor(result.error);
      if (annotation) stdout.write(annotation + "\n");
    }
    return result;
  }
}
