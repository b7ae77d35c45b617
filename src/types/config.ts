/** Configuration types for the layered config system. */
import type { LogLevel, OutputFormat } from "../log/logger.js";

export type VisibilityInput = "public" | "unlisted" | "hidden" | "private";

export type PushConfig = {
  host: string;
  visibility: VisibilityInput;
  /** Explicit `owner/flake` upload name; derived from `repository` when unset. */
  name?: string;
  repository?: string;
  /** Flake directory, relative to `git_root`. */
  directory: string;
  git_root?: string;
  tag?: string;
  rev?: string;
  rolling: boolean;
  rolling_minor?: number;
  mirror: boolean;
  extra_labels: string[];
  /** Deprecated spelling of `extra_labels`. */
  extra_tags: string[];
  spdx_expression?: string;
  error_on_conflict: boolean;
  include_output_paths: boolean;
  disable_rename_subgroups: boolean;
  jwt_issuer_uri?: string;
  github_token?: string;
  format: OutputFormat;
  log_level: LogLevel;
};

export type ConfigKey = keyof PushConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "host",
  "visibility",
  "name",
  "repository",
  "directory",
  "git_root",
  "tag",
  "rev",
  "rolling",
  "rolling_minor",
  "mirror",
  "extra_labels",
  "extra_tags",
  "spdx_expression",
  "error_on_conflict",
  "include_output_paths",
  "disable_rename_subgroups",
  "jwt_issuer_uri",
  "github_token",
  "format",
  "log_level",
];

/** Keys whose env/CLI form is a comma-separated list. */
export const LIST_KEYS: readonly ConfigKey[] = ["extra_labels", "extra_tags"];
