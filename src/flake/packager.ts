import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { gzipSync } from "node:zlib";
import { ConfigurationError, TransportError, errorMessage } from "../errors.js";
import type { Logger } from "../log/logger.js";
import { makeTarball, type Tarball } from "../release/tarball.js";

const pExecFile = promisify(execFile);

export const MIXED_FLAKE_TEMPLATE = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../nix/mixed-flake.nix");

/** Placeholder input URL in the template, replaced by the flake's locked URL. */
export const TEMPLATE_URL_PLACEHOLDER = "c9026fc0-ced9-48e0-aa3c-fc86c4c86df1";

export type CommandOutput = { stdout: Buffer; stderr: string };

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandOutput>;
}

export const execFileRunner: CommandRunner = {
  async run(command, args) {
    const { stdout, stderr } = await pExecFile(command, args, {
      encoding: "buffer",
      maxBuffer: 1024 * 1024 * 1024,
    });
    return { stdout, stderr: stderr.toString("utf8") };
  },
};

export type PackageRequest = {
  flakeDir: string;
  /** Scratch directory owned by the caller. */
  workDir: string;
  includeOutputPaths: boolean;
};

export type PackagedFlake = {
  metadata: unknown;
  outputs: unknown;
  tarball: Tarball;
  lastModified: number;
  readme?: string;
};

/** Evaluates and archives a flake. Deterministic for a given tree state. */
export interface FlakePackager {
  package(req: PackageRequest): Promise<PackagedFlake>;
}

export type FlakeMetadataFields = {
  url: string;
  /** Store path of the flake source, joined with `resolved.dir` when present. */
  source: string;
  lastModified: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Pull the fields packaging needs out of `nix flake metadata --json`. */
export function readFlakeMetadataFields(metadata: unknown): FlakeMetadataFields {
  if (!isRecord(metadata)) {
    throw new TransportError("`nix flake metadata --json` did not return an object");
  }
  const { url, path: storePath, lastModified, resolved } = metadata;
  if (typeof url !== "string") {
    throw new TransportError("Could not get `url` attribute from `nix flake metadata --json` output");
  }
  if (typeof storePath !== "string") {
    throw new TransportError("Could not get `path` attribute from `nix flake metadata --json` output");
  }
  if (lastModified === undefined) {
    throw new TransportError("`nix flake metadata` did not return a `lastModified` attribute");
  }
  if (typeof lastModified !== "number" || !Number.isInteger(lastModified) || lastModified < 0) {
    throw new TransportError("`nix flake metadata --json` does not have a integer `lastModified` field");
  }
  const dir = isRecord(resolved) && typeof resolved.dir === "string" ? resolved.dir : undefined;
  return { url, source: dir ? path.join(storePath, dir) : storePath, lastModified };
}

/** Render nix/mixed-flake.nix for a locked flake URL. */
export function renderMixedFlake(template: string, lockedUrl: string, includeOutputPaths: boolean): string {
  return template
    .replace(TEMPLATE_URL_PLACEHOLDER, lockedUrl)
    .replace("INCLUDE_OUTPUT_PATHS", includeOutputPaths ? "true" : "false");
}

/** GNU tar arguments for a reproducible archive of `source` rooted at its basename. */
export function tarArgs(source: string, lastModified: number): string[] {
  return [
    "-C",
    path.dirname(source),
    "--sort=name",
    "--owner=0",
    "--group=0",
    "--numeric-owner",
    "--format=gnu",
    `--mtime=@${lastModified}`,
    "-cf",
    "-",
    path.basename(source),
  ];
}

function parseJson(output: CommandOutput, command: string): unknown {
  try {
    return JSON.parse(output.stdout.toString("utf8"));
  } catch (err) {
    throw new TransportError(`Parsing \`${command}\` as JSON`, { cause: err });
  }
}

/** Packager backed by the `nix` and `tar` executables. */
export class NixFlakePackager implements FlakePackager {
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;
  private readonly templatePath: string;

  constructor(opts: { runner?: CommandRunner; logger?: Logger; templatePath?: string } = {}) {
    this.runner = opts.runner ?? execFileRunner;
    this.logger = opts.logger;
    this.templatePath = opts.templatePath ?? MIXED_FLAKE_TEMPLATE;
  }

  private async exec(command: string, args: string[]): Promise<CommandOutput> {
    const display = `${command} ${args.join(" ")}`;
    this.logger?.debug("EXEC", display);
    try {
      return await this.runner.run(command, args);
    } catch (err) {
      throw new TransportError(`Failed to execute \`${display}\`: ${errorMessage(err)}`, { cause: err });
    }
  }

  async package(req: PackageRequest): Promise<PackagedFlake> {
    const { flakeDir, workDir, includeOutputPaths } = req;

    await this.exec("nix", ["flake", "show", "--all-systems", "--json", "--no-write-lock-file", flakeDir]);

    const metadata = parseJson(
      await this.exec("nix", ["flake", "metadata", "--json", "--no-write-lock-file", flakeDir]),
      "nix flake metadata --json",
    );
    const fields = readFlakeMetadataFields(metadata);
    this.logger?.debug("FLAKE_METADATA", `Locked URL = ${fields.url}`, { lastModified: fields.lastModified });

    if (fs.existsSync(path.join(flakeDir, "flake.lock"))) {
      try {
        await this.runner.run("nix", ["flake", "metadata", "--json", "--no-update-lock-file", flakeDir]);
      } catch (err) {
        throw new ConfigurationError(
          `flake.lock in ${flakeDir} is out of date; run \`nix flake lock\` and commit the result: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }

    const outputs = await this.evaluateOutputs(fields.url, includeOutputPaths, workDir);

    const tar = await this.exec("tar", tarArgs(fields.source, fields.lastModified));
    const tarball = makeTarball(gzipSync(tar.stdout));
    this.logger?.debug("TARBALL", `Created tarball of ${fields.source}`, {
      length: tarball.bytes.length,
      sha256: tarball.hashBase64,
    });

    const readmePath = path.join(flakeDir, "README.md");
    const readme = fs.existsSync(readmePath) ? fs.readFileSync(readmePath, "utf8") : undefined;

    return { metadata, outputs, tarball, lastModified: fields.lastModified, readme };
  }

  private async evaluateOutputs(lockedUrl: string, includeOutputPaths: boolean, workDir: string): Promise<unknown> {
    const template = fs.readFileSync(this.templatePath, "utf8");
    const evalDir = path.join(workDir, "mixed-flake");
    fs.mkdirSync(evalDir, { recursive: true });
    fs.writeFileSync(path.join(evalDir, "flake.nix"), renderMixedFlake(template, lockedUrl, includeOutputPaths));

    const output = await this.exec("nix", ["eval", "--json", "--no-write-lock-file", `${evalDir}#contents`]);
    return parseJson(output, "nix eval --json #contents");
  }
}
