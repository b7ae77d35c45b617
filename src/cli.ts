#!/usr/bin/env node

import { Command } from "commander";
import { push } from "./commands/push.js";
import { EXIT } from "./commands/exit-codes.js";
import { reportPushResult } from "./commands/report.js";
import type { OutputFormat } from "./log/logger.js";

type PushCliOpts = {
  config?: string;
  host?: string;
  visibility?: string;
  name?: string;
  repository?: string;
  directory?: string;
  gitRoot?: string;
  tag?: string;
  rev?: string;
  rolling?: boolean;
  rollingMinor?: string;
  mirror?: boolean;
  extraLabels?: string;
  extraTags?: string;
  spdxExpression?: string;
  errorOnConflict?: boolean;
  includeOutputPaths?: boolean;
  disableRenameSubgroups?: boolean;
  jwtIssuerUri?: string;
  githubToken?: string;
  format?: string;
  logLevel?: string;
};

const program = new Command();

program
  .name("flakehub-push")
  .description("Publish a flake release to FlakeHub")
  .version("0.1.0");

program
  .command("push", { isDefault: true })
  .description("Package the flake and push a release")
  .option("--config <path>", "YAML config file layered over the defaults")
  .option("--host <url>", "Registry URL")
  .option("--visibility <visibility>", "public|unlisted|private")
  .option("--name <owner/flake>", "Upload name, if different from the repository")
  .option("--repository <owner/repo>", "Repository the flake lives in")
  .option("--directory <path>", "Flake directory, relative to the Git root")
  .option("--git-root <path>", "Root of the Git checkout")
  .option("--tag <tag>", "Release tag, e.g. v1.2.3")
  .option("--rev <revision>", "Revision to report instead of HEAD")
  .option("--rolling", "Publish a rolling release")
  .option("--rolling-minor <minor>", "Minor version of a rolling release")
  .option("--mirror", "Mark the release as a mirror")
  .option("--extra-labels <labels>", "Comma-separated labels")
  .option("--extra-tags <labels>", "Deprecated alias of --extra-labels")
  .option("--spdx-expression <expr>", "SPDX license expression")
  .option("--error-on-conflict", "Fail when the release already exists")
  .option("--include-output-paths", "Include store paths of outputs in the metadata")
  .option("--disable-rename-subgroups", "Reject nested subgroups instead of flattening them")
  .option("--jwt-issuer-uri <url>", "Development JWT issuer (local runs only)")
  .option("--github-token <token>", "GitHub token for repository data")
  .option("--format <format>", "Output format: human|jsonl")
  .option("--log-level <level>", "error|warn|info|debug")
  .action(async (opts: PushCliOpts) => {
    const format: OutputFormat = (opts.format ?? process.env.FLAKEHUB_PUSH_FORMAT) === "jsonl" ? "jsonl" : "human";
    const res = await push({
      configFile: opts.config,
      flags: {
        host: opts.host,
        visibility: opts.visibility,
        name: opts.name,
        repository: opts.repository,
        directory: opts.directory,
        git_root: opts.gitRoot,
        tag: opts.tag,
        rev: opts.rev,
        rolling: opts.rolling,
        rolling_minor: opts.rollingMinor,
        mirror: opts.mirror,
        extra_labels: opts.extraLabels,
        extra_tags: opts.extraTags,
        spdx_expression: opts.spdxExpression,
        error_on_conflict: opts.errorOnConflict,
        include_output_paths: opts.includeOutputPaths,
        disable_rename_subgroups: opts.disableRenameSubgroups,
        jwt_issuer_uri: opts.jwtIssuerUri,
        github_token: opts.githubToken,
        format: opts.format,
        log_level: opts.logLevel,
      },
    });

    reportPushResult(res, format, process.stdout, process.stderr);
    if (!res.ok) process.exit(res.exitCode);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(EXIT.PUSH_FAILED);
});
