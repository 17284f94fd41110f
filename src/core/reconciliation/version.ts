/**
 * Kubernetes API version labels
 *
 * `v2` is generally available, `v2beta1` and `v2alpha3` are pre-releases of
 * major 2. Anything else (`v1gamma`, `latest`) is an opaque label.
 *
 * @module
 */

export type VersionStage = "ga" | "beta" | "alpha" | "other";

export type ParsedVersion =
  | { stage: "ga"; major: number; label: string }
  | { stage: "beta" | "alpha"; major: number; minor?: number; label: string }
  | { stage: "other"; label: string };

const VERSION_PATTERN = /^v(\d+)(?:(alpha|beta)(\d*))?$/;

const STAGE_RANK: Readonly<Record<VersionStage, number>> = {
  ga: 3,
  beta: 2,
  alpha: 1,
  other: 0,
};

export function parseVersion(label: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(label);
  const majorText = match?.[1];
  if (!match || majorText === undefined) {
    return { stage: "other", label };
  }

  const major = Number(majorText);
  const stage = match[2];
  if (stage === "alpha" || stage === "beta") {
    const minorText = match[3];
    return minorText ? { stage, major, minor: Number(minorText), label } : { stage, major, label };
  }
  return { stage: "ga", major, label };
}

/**
 * Compare two labels by priority: positive when `a` ranks above `b`.
 *
 * GA outranks beta, beta outranks alpha, and all of them outrank opaque
 * labels. Within a stage the higher major wins, and a numbered pre-release
 * outranks an unnumbered one. Opaque labels rank lexically.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  const byStage = STAGE_RANK[left.stage] - STAGE_RANK[right.stage];
  if (byStage !== 0) {
    return byStage;
  }
  if (left.stage === "other" || right.stage === "other") {
    return left.label < right.label ? -1 : left.label > right.label ? 1 : 0;
  }
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.stage === "ga" || right.stage === "ga") {
    return 0;
  }
  return (left.minor ?? -1) - (right.minor ?? -1);
}

/**
 * Labels from highest to lowest priority.
 */
export function sortByPriority(labels: Iterable<string>): string[] {
  return [...labels].sort((a, b) => compareVersions(b, a));
}
