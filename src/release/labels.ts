import type { Logger } from "../log/logger.js";

export const MAX_LABEL_LENGTH = 50;
export const MAX_NUM_TOTAL_LABELS = 25;

const LABEL_CHARS = /^[a-z0-9-]+$/;

export type LabelSources = {
  extraLabels: readonly string[];
  /** Deprecated; used only when `extraLabels` is empty. */
  extraTags: readonly string[];
  /** Topics reported by the hosting platform. */
  topics: readonly string[];
};

function normalize(label: string): string | undefined {
  const l = label.trim().toLowerCase();
  if (l.length === 0 || l.length > MAX_LABEL_LENGTH || !LABEL_CHARS.test(l)) return undefined;
  return l;
}

/**
 * Merge user labels with platform topics. Invalid labels are dropped silently;
 * the result is sorted and holds at most MAX_NUM_TOTAL_LABELS entries.
 */
export function mergeLabels(sources: LabelSources, logger?: Logger): string[] {
  let explicit = sources.extraLabels;
  if (sources.extraTags.length > 0) {
    logger?.warn(
      "EXTRA_TAGS_DEPRECATED",
      "`extra-tags` is deprecated and will be removed in the future. Please use `extra-labels` instead.",
    );
    if (explicit.length === 0) {
      explicit = sources.extraTags;
    } else {
      logger?.warn("EXTRA_TAGS_IGNORED", "Both `extra-tags` and `extra-labels` were set; `extra-tags` will be ignored.");
    }
  }

  const union = [...new Set([...explicit, ...sources.topics])].sort().slice(0, MAX_NUM_TOTAL_LABELS);

  const labels = new Set<string>();
  for (const raw of union) {
    const label = normalize(raw);
    if (label !== undefined) labels.add(label);
  }
  return [...labels].sort();
}
