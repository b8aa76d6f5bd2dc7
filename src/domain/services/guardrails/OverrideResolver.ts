import type { OperatorOverride } from '../../entities/OperatorOverride.js';

export interface OverrideDecision {
  approved: ReadonlyMap<string, OperatorOverride>;
  flagged: ReadonlyMap<string, OperatorOverride>;
}

/** Approval wins over a flag on the same recommendation id. */
export const resolveOverrides = (overrides: readonly OperatorOverride[], userId: string): OverrideDecision => {
  const approved = new Map<string, OperatorOverride>();
  const flagged = new Map<string, OperatorOverride>();

  const ordered = overrides
    .filter((override) => override.userId === userId)
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));

  for (const override of ordered) {
    const target = override.action === 'approve' ? approved : flagged;
    if (!target.has(override.recommendationId)) {
      target.set(override.recommendationId, override);
    }
  }

  for (const id of approved.keys()) {
    flagged.delete(id);
  }

  return { approved, flagged };
};
