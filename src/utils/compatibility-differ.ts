/**
 * Compatibility Differ
 *
 * Compares the registry of a base revision with the registry of a candidate
 * revision. A node present in both is compatible only if its return types
 * match position by position; nodes that only exist on one side are listed
 * but never produce a breaking finding.
 */

import type {
  CompatibilityFinding,
  CompatibilityReport,
  DiffPolicy,
  Registry,
  ReturnTypeMismatch,
} from '../types/node-registry.js';

export const DEFAULT_DIFF_POLICY: Required<DiffPolicy> = {
  allowAppendedReturnTypes: false,
  failOnRemoved: false,
};

/**
 * Diff two registries
 */
export function diffRegistries(
  base: Registry,
  candidate: Registry,
  policy: DiffPolicy = {}
): CompatibilityReport {
  const effective: Required<DiffPolicy> = {
    allowAppendedReturnTypes:
      policy.allowAppendedReturnTypes ?? DEFAULT_DIFF_POLICY.allowAppendedReturnTypes,
    failOnRemoved: policy.failOnRemoved ?? DEFAULT_DIFF_POLICY.failOnRemoved,
  };

  const baseIds = sortIdentifiers(base.keys());
  const candidateIds = sortIdentifiers(candidate.keys());

  const findings: CompatibilityFinding[] = [];
  for (const identifier of baseIds) {
    const after = candidate.get(identifier);
    const before = base.get(identifier);
    if (!after || !before) continue;

    findings.push(
      compareReturnTypes(identifier, before.returnTypes, after.returnTypes, effective)
    );
  }

  const removed = baseIds.filter((id) => !candidate.has(id));
  const added = candidateIds.filter((id) => !base.has(id));

  const breaking =
    findings.some((finding) => finding.isBreaking) ||
    (effective.failOnRemoved && removed.length > 0);

  return { findings, added, removed, breaking, policy: effective };
}

/**
 * Compare the return types of one node across revisions
 */
export function compareReturnTypes(
  identifier: string,
  baseReturnTypes: readonly string[],
  candidateReturnTypes: readonly string[],
  policy: DiffPolicy = {}
): CompatibilityFinding {
  const mismatches: ReturnTypeMismatch[] = [];
  const length = Math.max(baseReturnTypes.length, candidateReturnTypes.length);

  for (let index = 0; index < length; index++) {
    const before = baseReturnTypes[index];
    const after = candidateReturnTypes[index];
    if (before !== after) {
      mismatches.push({ index, base: before, candidate: after });
    }
  }

  const isBreaking = policy.allowAppendedReturnTypes
    ? mismatches.some((m) => m.base !== undefined)
    : mismatches.length > 0;

  return {
    identifier,
    baseReturnTypes,
    candidateReturnTypes,
    isBreaking,
    mismatches,
  };
}

/**
 * Sort by UTF-16 code units so output does not depend on the locale
 */
function sortIdentifiers(ids: Iterable<string>): string[] {
  return [...ids].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
